import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import { composeTransport } from "./compose";
import { DefaultErrorHandler, describeError } from "./errors";
import { createEndpoint, Group, type GroupHost } from "./group";
import { createLogger } from "./logger";
import { shutdown, toWebRequest, waitForSignal, writeWebResponse } from "./node";
import { envelopeResponse, failure } from "./response";
import { joinPaths, pathnameOf, RouteTable } from "./router";
import { serveStatic } from "./static";
import type {
	AppConfig,
	Endpoint,
	ErrorHandler,
	FetchHandler,
	Handler,
	ListenOptions,
	Logger,
	Middleware,
	RunOptions,
	Server,
	State,
	TransportMiddleware,
} from "./types";

/**
 * Configuration used for everything not passed to the App constructor.
 */
export function defaultAppConfig<T extends State = State>(): AppConfig<T> {
	return {
		logger: createLogger(),
		errorHandler: new DefaultErrorHandler<T>(),
		readTimeout: 15_000,
		writeTimeout: 15_000,
		shutdownTimeout: 5_000,
		hostname: "localhost",
	};
}

/**
 * The application: owns the route table, the application-level middlewares and
 * the shared logger and error handler, and serves requests over Node's HTTP server.
 *
 * Requests go through the transport wrappers added with {@link wrap}, then routing,
 * then the matched route's precomputed chain.
 *
 * @template T - Shape of the per-request key/value store
 *
 * @example
 * ```typescript
 * const app = new App();
 * app.use(logger(), recover());
 *
 * app.add("/api", (api) => {
 *   api.get("/users/:id", (ctx) => ctx.success({ id: ctx.param("id") }));
 * });
 *
 * await app.run(8080);
 * ```
 */
export class App<T extends State = State> {
	readonly config: AppConfig<T>;

	private readonly middlewares: Middleware<T>[] = [];
	private readonly wrappers: TransportMiddleware[] = [];
	private readonly table = new RouteTable<Endpoint>();
	private readonly services: { logger: Logger; errorHandler: ErrorHandler<T> };
	private readonly host: GroupHost<T>;
	private notFound: Endpoint;
	private fetchHandler?: FetchHandler;

	constructor(config: Partial<AppConfig<T>> = {}) {
		this.config = { ...defaultAppConfig<T>(), ...config };
		this.services = { logger: this.config.logger, errorHandler: this.config.errorHandler };
		this.host = {
			middlewares: () => this.middlewares,
			services: this.services,
			register: (methods, path, endpoint) => this.table.add(methods, path, endpoint),
		};
		this.notFound = async () => envelopeResponse(404, failure(404, "Not Found"));
		this.handle = this.handle.bind(this);
	}

	/** Shared application logger */
	get logger(): Logger {
		return this.services.logger;
	}

	/**
	 * Appends application-level middlewares. They run outside every group's own
	 * middlewares, for routes registered from now on.
	 */
	use(...middlewares: Middleware<T>[]): this {
		this.middlewares.push(...middlewares);
		return this;
	}

	/**
	 * Adds transport-level wrappers. These run for every request before routing,
	 * including requests that end up as 404 or in a static mount.
	 * CORS is one of these and is off until wrapped.
	 *
	 * @example
	 * ```typescript
	 * app.wrap(cors({ origin: ["https://app.example.com"] }));
	 * ```
	 */
	wrap(...wrappers: TransportMiddleware[]): this {
		this.wrappers.push(...wrappers);
		this.fetchHandler = undefined;
		return this;
	}

	/**
	 * Replaces the logger for every request handled from now on.
	 */
	setLogger(logger: Logger): this {
		this.services.logger = logger;
		return this;
	}

	/**
	 * Replaces the handler behind `ctx.handleError()`.
	 */
	setErrorHandler(handler: ErrorHandler<T>): this {
		this.services.errorHandler = handler;
		return this;
	}

	/**
	 * Creates a route group below `prefix`.
	 */
	group(prefix: string): Group<T> {
		return new Group<T>(prefix, this.host);
	}

	/**
	 * Creates a group below `prefix` and hands it to `setup`.
	 *
	 * @example
	 * ```typescript
	 * app.add("/admin", (admin) => {
	 *   admin.use(requireAdmin);
	 *   admin.get("/stats", showStats);
	 * });
	 * ```
	 */
	add(prefix: string, setup: (group: Group<T>) => void): this {
		setup(this.group(prefix));
		return this;
	}

	/**
	 * Serves files from `dir` for GET and HEAD requests below `prefix`.
	 * Directories serve their `index.html`. No middleware runs for these requests.
	 *
	 * @example
	 * ```typescript
	 * app.static("/assets", "./public");
	 * // GET /assets/css/site.css -> ./public/css/site.css
	 * ```
	 */
	static(prefix: string, dir: string): this {
		const serve = serveStatic(dir);
		this.table.add(["GET", "HEAD"], joinPaths(prefix, "*"), async (req, params) => {
			const response = await serve(params["*"] ?? "", req.method);
			return response ?? this.notFound(req, {});
		});
		return this;
	}

	/**
	 * Replaces the handler for requests that match no route. It runs without the middleware chain.
	 */
	onNotFound(handler: Handler<T>): this {
		this.notFound = createEndpoint(handler, this.services);
		return this;
	}

	/**
	 * Lists registrations as `"<path> [<METHODS>]"`, in the order they were made.
	 *
	 * @example
	 * ```typescript
	 * app.routes(); // ["/api/users [GET,POST]", "/health []"]
	 * ```
	 */
	routes(): string[] {
		return this.table.list().map((route) => `${route.path} [${route.methods.join(",")}]`);
	}

	/**
	 * Fetch-style entry point. Never rejects: failures escaping routing become a 500 envelope.
	 *
	 * @example
	 * ```typescript
	 * const res = await app.handle(new Request("http://localhost/api/users/1"));
	 * ```
	 */
	async handle(req: Request): Promise<Response> {
		this.fetchHandler ??= composeTransport(...this.wrappers)((request) => this.dispatch(request));

		let response: Response;
		try {
			response = await this.fetchHandler(req);
		} catch (err) {
			this.services.logger.error("Error handling request: %s", describeError(err));
			response = envelopeResponse(500, failure(500, "Internal Server Error"));
		}

		if (req.method === "HEAD" && response.body !== null) {
			return new Response(null, { status: response.status, statusText: response.statusText, headers: response.headers });
		}
		return response;
	}

	/**
	 * Node.js `request` listener. The request's signal fires if the client
	 * disconnects before the response is finished.
	 */
	async handleNode(req: IncomingMessage, res: ServerResponse): Promise<void> {
		const controller = new AbortController();
		const onClose = (): void => {
			if (!res.writableFinished) controller.abort();
		};
		res.on("close", onClose);

		try {
			const request = await toWebRequest(req, controller.signal);
			await writeWebResponse(res, await this.handle(request));
		} catch (err) {
			this.services.logger.error("Error writing response: %s", describeError(err));
			if (!res.headersSent) {
				res.writeHead(500, { "Content-Type": "application/json" });
				res.end(JSON.stringify(failure(500, "Internal Server Error")));
			} else {
				res.destroy();
			}
		} finally {
			res.off("close", onClose);
		}
	}

	/**
	 * Starts a Node.js HTTP server using the configured timeouts.
	 *
	 * @example
	 * ```typescript
	 * const server = await app.listen({ port: 0 });
	 * console.log(`listening on ${server.port}`);
	 * await server.stop();
	 * ```
	 */
	async listen(options: ListenOptions = {}): Promise<Server> {
		const { port = 3000, hostname = this.config.hostname, onListen } = options;

		const nodeServer = createServer({ requestTimeout: this.config.readTimeout }, (req, res) => {
			this.handleNode(req, res).catch((err: unknown) => {
				this.services.logger.error("Error handling request: %s", describeError(err));
			});
		});
		nodeServer.setTimeout(this.config.writeTimeout);

		await new Promise<void>((resolve, reject) => {
			nodeServer.once("error", reject);
			nodeServer.listen(port, hostname, () => {
				nodeServer.off("error", reject);
				resolve();
			});
		});

		const address = nodeServer.address();
		const server: Server = {
			port: isAddressInfo(address) ? address.port : port,
			hostname,
			instance: nodeServer,
			stop: (graceMs = this.config.shutdownTimeout) => shutdown(nodeServer, graceMs),
		};

		onListen?.({ port: server.port, hostname: server.hostname });
		return server;
	}

	/**
	 * Serves until the process receives one of the shutdown signals, then shuts
	 * down gracefully within `shutdownTimeout`.
	 */
	async run(port: number, options: RunOptions = {}): Promise<void> {
		const { hostname = this.config.hostname, signals = ["SIGINT"] } = options;

		const server = await this.listen({ port, hostname });
		this.logger.info("Server started at http://%s:%s", server.hostname, server.port);

		await waitForSignal(signals);
		this.logger.info("Shutting down server...");

		try {
			await server.stop(this.config.shutdownTimeout);
		} catch (err) {
			this.logger.error("Server shutdown error: %s", describeError(err));
			throw err;
		}
		this.logger.info("Server gracefully stopped");
	}

	private async dispatch(req: Request): Promise<Response> {
		const result = this.table.lookup(req.method, pathnameOf(req.url));

		switch (result.status) {
			case "found":
				return result.entry(req, result.params);
			case "method-not-allowed":
				return envelopeResponse(405, failure(405, "Method Not Allowed"), { Allow: result.allowed.join(", ") });
			case "not-found":
				return this.notFound(req, {});
		}
	}
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
	return typeof address === "object" && address !== null;
}
