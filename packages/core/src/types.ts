import type { Server as HttpServer } from "node:http";
import type { Context } from "./context";

/**
 * Shape of the per-request key/value store.
 * Declare your own interface to get typed `ctx.get()` / `ctx.set()` calls.
 *
 * @example
 * ```typescript
 * interface AppState {
 *   [key: string]: unknown;
 *   user: { id: string };
 * }
 *
 * const app = new App<AppState>();
 * ```
 */
export type State = Record<string, unknown>;

/**
 * HTTP methods supported by the framework.
 */
export type Method = "GET" | "POST" | "PUT" | "DELETE" | "PATCH" | "OPTIONS" | "HEAD";

/**
 * Terminal request handler. Writes its response through the context.
 *
 * @example
 * ```typescript
 * const getUser: Handler = async (ctx) => {
 *   const user = await users.find(ctx.param("id"));
 *   ctx.success(user);
 * };
 * ```
 */
export type Handler<T extends State = State> = (ctx: Context<T>) => void | Promise<void>;

/**
 * Transforms a handler into another handler that wraps it with pre/post behavior.
 * Code before `next(ctx)` runs on the way in, code after it on the way out.
 *
 * @example
 * ```typescript
 * const requestId: Middleware = (next) => async (ctx) => {
 *   ctx.set("requestId", crypto.randomUUID());
 *   await next(ctx);
 * };
 * ```
 */
export type Middleware<T extends State = State> = (next: Handler<T>) => Handler<T>;

/**
 * Fetch-style entry point: a Web Request in, a Web Response out.
 */
export type FetchHandler = (req: Request) => Promise<Response>;

/**
 * Wraps the whole application below routing. Runs for every request,
 * including ones that match no route (404) or a static file.
 */
export type TransportMiddleware = (next: FetchHandler) => FetchHandler;

/**
 * Transport-facing entry point produced for a registered route.
 */
export type Endpoint = (req: Request, params: Record<string, string>) => Promise<Response>;

/**
 * Pluggable application logger. Must be safe to share between concurrent requests.
 */
export interface Logger {
	info(format: string, ...args: unknown[]): void;
	error(format: string, ...args: unknown[]): void;
	debug(format: string, ...args: unknown[]): void;
}

/**
 * Central error formatting invoked through `ctx.handleError(err)`.
 */
export interface ErrorHandler<T extends State = State> {
	handle(ctx: Context<T>, err: unknown): void;
}

/**
 * Shared collaborators every context can reach. Handed to contexts instead of
 * the application itself.
 */
export interface Services<T extends State = State> {
	readonly logger: Logger;
	readonly errorHandler: ErrorHandler<T>;
}

/**
 * Error member of the response envelope.
 */
export interface ApiError {
	code: number;
	message: string;
}

/**
 * Uniform JSON response envelope. Absent members are omitted from the wire.
 */
export interface Envelope<D = unknown, M = unknown> {
	success: boolean;
	data?: D;
	error?: ApiError;
	meta?: M;
}

/**
 * Application configuration. Durations are in milliseconds.
 */
export interface AppConfig<T extends State = State> {
	/** Shared logger. Default: console logger at debug level */
	logger: Logger;
	/** Handler behind `ctx.handleError()`. Default: 500 envelope with the error text */
	errorHandler: ErrorHandler<T>;
	/** Maximum time to receive a complete request. Default: 15000 */
	readTimeout: number;
	/** Socket inactivity limit while responding. Default: 15000 */
	writeTimeout: number;
	/** Grace period for in-flight requests on shutdown. Default: 5000 */
	shutdownTimeout: number;
	/** Interface to bind when listening. Default: "localhost" */
	hostname: string;
}

/**
 * Options accepted by `app.listen()`.
 */
export interface ListenOptions {
	/** Port to listen on, 0 picks a free one. Default: 3000 */
	port?: number;
	/** Interface to bind. Default: the configured hostname */
	hostname?: string;
	/** Called once the server accepts connections */
	onListen?: (info: { port: number; hostname: string }) => void;
}

/**
 * Options accepted by `app.run()`.
 */
export interface RunOptions {
	/** Interface to bind. Default: the configured hostname */
	hostname?: string;
	/** Process signals that trigger graceful shutdown. Default: ["SIGINT"] */
	signals?: NodeJS.Signals[];
}

/**
 * A running server.
 */
export interface Server {
	port: number;
	hostname: string;
	instance: HttpServer;
	/**
	 * Stops accepting connections and waits for in-flight requests.
	 * Connections still open after `graceMs` are destroyed.
	 */
	stop: (graceMs?: number) => Promise<void>;
}
