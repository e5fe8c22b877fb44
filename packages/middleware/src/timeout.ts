import { describeError, type Middleware, type State } from "@weft/web";

/**
 * Bounds the time inner layers get to produce a response.
 *
 * Inner layers see a derived `ctx.signal` that aborts on the deadline, when the
 * client goes away, or once this middleware returns. When the deadline passes
 * first the request is answered with a 408 envelope and the handler is left running
 * with the aborted signal in place; its late write is discarded by the context and
 * a late failure is only logged. The outer signal is put back only once the handler finished.
 * When the client goes away first nothing is written.
 *
 * @param ms - Deadline in milliseconds
 *
 * @example
 * ```typescript
 * api.use(timeout(5000));
 *
 * api.get("/report", async (ctx) => {
 *   const rows = await db.query(sql, { signal: ctx.signal });
 *   ctx.success(rows);
 * });
 * ```
 */
export function timeout<T extends State = State>(ms: number): Middleware<T> {
	return (next) => async (ctx) => {
		const parent = ctx.signal;
		const controller = new AbortController();
		let timedOut = false;

		const onParentAbort = (): void => controller.abort(parent.reason);
		if (parent.aborted) {
			onParentAbort();
		} else {
			parent.addEventListener("abort", onParentAbort, { once: true });
		}

		const timer = setTimeout(() => {
			timedOut = true;
			controller.abort(new Error(`request timed out after ${ms}ms`));
		}, ms);

		const cancelled = new Promise<"cancelled">((resolve) => {
			if (controller.signal.aborted) {
				resolve("cancelled");
			} else {
				controller.signal.addEventListener("abort", () => resolve("cancelled"), { once: true });
			}
		});

		ctx.signal = controller.signal;
		let finished = false;
		const work = Promise.resolve()
			.then(() => next(ctx))
			.finally(() => {
				finished = true;
			});

		try {
			const outcome = await Promise.race([work.then(() => "done" as const), cancelled]);
			if (outcome === "done") return;

			work.catch((err: unknown) => {
				ctx.logger.error("Handler failed after timeout: %s", describeError(err));
			});

			if (timedOut) {
				ctx.error(408, "Request timeout");
			}
		} finally {
			clearTimeout(timer);
			parent.removeEventListener("abort", onParentAbort);
			if (finished) ctx.signal = parent;
			controller.abort();
		}
	};
}
