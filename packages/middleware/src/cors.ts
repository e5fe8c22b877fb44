import type { FetchHandler, TransportMiddleware } from "@weft/web";

/**
 * Options to configure the CORS middleware behavior.
 */
export interface CorsOptions {
	/**
	 * The origin(s) allowed to access the resource.
	 * Can be a string, array of strings, or a function returning a boolean or Promise<boolean>.
	 * Default: ["*"]
	 */
	origin?: string | string[] | ((origin: string) => boolean | Promise<boolean>);

	/**
	 * Allowed HTTP methods for CORS requests.
	 * Default: ["GET", "POST", "PUT", "DELETE", "PATCH", "OPTIONS"]
	 */
	allowMethods?: string[];

	/**
	 * Allowed headers for CORS requests.
	 * Default: ["Content-Type", "Authorization", "X-Requested-With"]
	 */
	allowHeaders?: string[];

	/**
	 * Response headers browsers may expose to scripts (`Access-Control-Expose-Headers`).
	 */
	exposeHeaders?: string[];

	/**
	 * Whether to include credentials (cookies, authorization headers, TLS client certificates).
	 * The request origin is echoed instead of "*" when enabled.
	 * Default: true
	 */
	credentials?: boolean;

	/**
	 * How long the results of a preflight request can be cached (in seconds).
	 * Default: 86400
	 */
	maxAge?: number;

	/**
	 * Whether the middleware should pass control to the next handler after preflight.
	 * Default: false
	 */
	preflightContinue?: boolean;

	/**
	 * The HTTP status code sent for successful OPTIONS requests.
	 * Default: 204
	 */
	optionsSuccessStatus?: number;
}

const defaults: Required<CorsOptions> = {
	origin: ["*"],
	allowMethods: ["GET", "POST", "PUT", "DELETE", "PATCH", "OPTIONS"],
	allowHeaders: ["Content-Type", "Authorization", "X-Requested-With"],
	exposeHeaders: [],
	credentials: true,
	maxAge: 86400,
	preflightContinue: false,
	optionsSuccessStatus: 204,
};

/**
 * CORS handling, applied with `app.wrap()` so that preflights are answered even
 * for paths that have no OPTIONS route.
 *
 * @example
 * ```typescript
 * app.wrap(cors());
 *
 * app.wrap(cors({
 *   origin: ["https://app.example.com"],
 *   exposeHeaders: ["X-Total-Count"],
 * }));
 * ```
 */
export function cors(options: CorsOptions = {}): TransportMiddleware {
	const opts: Required<CorsOptions> = { ...defaults, ...options };

	return (next: FetchHandler) => async (req) => {
		const origin = req.headers.get("Origin");
		if (!origin) return next(req);

		const isPreflight = req.method === "OPTIONS" && req.headers.has("Access-Control-Request-Method");
		const isAllowed = await checkOrigin(origin, opts.origin);

		const headers = new Headers();
		if (isAllowed) {
			const wildcard = isWildcard(opts.origin) && !opts.credentials;
			headers.set("Access-Control-Allow-Origin", wildcard ? "*" : origin);
			if (!wildcard) headers.append("Vary", "Origin");

			if (opts.credentials) {
				headers.set("Access-Control-Allow-Credentials", "true");
			}

			if (isPreflight) {
				if (opts.allowMethods.length) {
					headers.set("Access-Control-Allow-Methods", opts.allowMethods.join(", "));
				}
				if (opts.allowHeaders.length) {
					headers.set("Access-Control-Allow-Headers", opts.allowHeaders.join(", "));
				}
				if (opts.maxAge) {
					headers.set("Access-Control-Max-Age", opts.maxAge.toString());
				}
			} else if (opts.exposeHeaders.length) {
				headers.set("Access-Control-Expose-Headers", opts.exposeHeaders.join(", "));
			}
		}

		if (isPreflight && !opts.preflightContinue) {
			return new Response(null, { status: opts.optionsSuccessStatus, headers });
		}

		const response = await next(req);
		return withHeaders(response, headers);
	};
}

/**
 * Validates if the request origin is allowed based on the provided CORS origin config.
 */
async function checkOrigin(origin: string, allowed: CorsOptions["origin"]): Promise<boolean> {
	if (!allowed || isWildcard(allowed)) return true;
	if (typeof allowed === "string") return origin === allowed;
	if (Array.isArray(allowed)) return allowed.includes(origin);
	return allowed(origin);
}

function isWildcard(allowed: CorsOptions["origin"]): boolean {
	return allowed === "*" || (Array.isArray(allowed) && allowed.includes("*"));
}

function withHeaders(response: Response, extra: Headers): Response {
	if ([...extra.keys()].length === 0) return response;

	const headers = new Headers(response.headers);
	extra.forEach((value, name) => {
		if (name === "vary") {
			headers.append(name, value);
		} else {
			headers.set(name, value);
		}
	});
	return new Response(response.body, { status: response.status, statusText: response.statusText, headers });
}
