import { describeError, failure, type Context, type Middleware, type State } from "@weft/web";

/**
 * Options for the recover middleware.
 */
export interface RecoverOptions<T extends State = State> {
	/**
	 * Called with the caught value before the 500 response is written.
	 */
	onPanic?: (err: unknown, ctx: Context<T>) => void;
}

/**
 * Catches anything thrown or rejected by inner layers, logs it as
 * `Panic recovered: …` and answers with a 500 envelope. Nothing is re-thrown.
 *
 * @example
 * ```typescript
 * app.use(logger(), recover());
 *
 * // Report failures somewhere
 * app.use(recover({ onPanic: (err) => errorReporter.capture(err) }));
 * ```
 */
export function recover<T extends State = State>(options: RecoverOptions<T> = {}): Middleware<T> {
	const { onPanic } = options;

	return (next) => async (ctx) => {
		try {
			await next(ctx);
		} catch (err) {
			ctx.logger.error("Panic recovered: %s", describeError(err));
			onPanic?.(err, ctx);
			ctx.json(500, failure(500, "Internal Server Error"));
		}
	};
}
