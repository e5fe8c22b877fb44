import type { Context, Logger, Middleware, State } from "@weft/web";

/**
 * Options for configuring the logger middleware.
 */
export interface LoggerOptions<T extends State = State> {
	/**
	 * Logger to write to instead of the application logger.
	 */
	logger?: Logger;

	/**
	 * Paths to exclude from logging (exact match or regex).
	 * Default: []
	 */
	excludePaths?: (string | RegExp)[];

	/**
	 * Function to determine if a request should be skipped.
	 */
	skip?: (ctx: Context<T>) => boolean;
}

/**
 * Request logging middleware.
 *
 * Logs `"<METHOD> <path>"` at info level on the way in and `"Completed in <n>ms"`
 * at debug level on the way out. The completion line is written even when an inner
 * layer throws; the error keeps propagating.
 *
 * @example
 * ```typescript
 * // Application logger
 * app.use(logger());
 *
 * // Quiet health checks
 * app.use(logger({ excludePaths: ["/health", /^\/metrics/] }));
 *
 * // Separate access log
 * app.use(logger({ logger: createLogger({ level: Levels.INFO }) }));
 * ```
 */
export function logger<T extends State = State>(options: LoggerOptions<T> = {}): Middleware<T> {
	const { logger: providedLogger, excludePaths = [], skip } = options;

	return (next) => async (ctx) => {
		if (skip?.(ctx) || isExcluded(ctx.path, excludePaths)) {
			await next(ctx);
			return;
		}

		const log = providedLogger ?? ctx.logger;
		const startTime = Date.now();

		if (providedLogger) {
			providedLogger.info("%s %s", ctx.req.method, ctx.path);
		} else {
			ctx.logRequest();
		}

		try {
			await next(ctx);
		} finally {
			log.debug("Completed in %dms", Date.now() - startTime);
		}
	};
}

function isExcluded(pathname: string, excludePaths: (string | RegExp)[]): boolean {
	return excludePaths.some((path) => (typeof path === "string" ? pathname === path : path.test(pathname)));
}
