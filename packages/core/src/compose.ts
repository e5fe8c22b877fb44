import type { FetchHandler, Handler, Middleware, State, TransportMiddleware } from "./types";

/**
 * Composes middlewares from outer to inner.
 * `compose(a, b, c)(handler)` is `a(b(c(handler)))`: a's pre-logic runs first and its post-logic last.
 *
 * @example
 * ```typescript
 * const handler = compose(logger(), recover(), timeout(5000))(getUsers);
 * ```
 */
export function compose<T extends State = State>(...middlewares: Middleware<T>[]): (handler: Handler<T>) => Handler<T> {
	return (handler) => middlewares.reduceRight<Handler<T>>((inner, middleware) => middleware(inner), handler);
}

/**
 * Composes transport-level wrappers with the same ordering rule as {@link compose}.
 */
export function composeTransport(...wrappers: TransportMiddleware[]): (handler: FetchHandler) => FetchHandler {
	return (handler) => wrappers.reduceRight<FetchHandler>((inner, wrapper) => wrapper(inner), handler);
}
