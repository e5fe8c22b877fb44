import type { Context } from "./context";
import type { ErrorHandler, State } from "./types";

/**
 * Error carrying the HTTP status it should be answered with.
 *
 * @example
 * ```typescript
 * group.get("/users/:id", async (ctx) => {
 *   const user = await users.find(ctx.param("id"));
 *   if (!user) return ctx.handleError(new HttpError(404, "User not found"));
 *   ctx.success(user);
 * });
 * ```
 */
export class HttpError extends Error {
	constructor(public readonly status: number, message: string) {
		super(message);
		this.name = "HttpError";
	}
}

/**
 * Thrown by `ctx.mustGet()` when the key was never set.
 */
export class ContextKeyError extends Error {
	constructor(public readonly key: string) {
		super(`Key ${key} does not exist in context`);
		this.name = "ContextKeyError";
	}
}

/**
 * Request body could not be decoded into the expected shape.
 * `details` lists every problem found, `message` the first one.
 */
export class BindError extends Error {
	constructor(message: string, public readonly details: string[] = [message]) {
		super(message);
		this.name = "BindError";
	}
}

/**
 * Default error handler: answers with a 500 envelope carrying the error text,
 * or with the status of an {@link HttpError}.
 */
export class DefaultErrorHandler<T extends State = State> implements ErrorHandler<T> {
	handle(ctx: Context<T>, err: unknown): void {
		if (err instanceof HttpError) {
			ctx.error(err.status, "%s", err.message);
			return;
		}
		ctx.error(500, "%s", err instanceof Error ? err.message : describeError(err));
	}
}

/**
 * Renders any thrown value as a single log-friendly line.
 */
export function describeError(err: unknown): string {
	if (err instanceof Error) return err.message ? `${err.name}: ${err.message}` : err.name;
	if (typeof err === "string") return err;
	try {
		return JSON.stringify(err) ?? String(err);
	} catch {
		return String(err);
	}
}
