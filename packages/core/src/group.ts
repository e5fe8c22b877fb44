import { compose } from "./compose";
import { Context } from "./context";
import { describeError } from "./errors";
import { failure } from "./response";
import { joinPaths } from "./router";
import type { Endpoint, Handler, Method, Middleware, Services, State } from "./types";

/**
 * What a group needs from the application that owns it.
 */
export interface GroupHost<T extends State = State> {
	/** Application-level middlewares, in registration order */
	middlewares(): readonly Middleware<T>[];
	/** Collaborators handed to every context */
	readonly services: Services<T>;
	/** Adds an endpoint to the route table. An empty method list means any method. */
	register(methods: readonly Method[], path: string, endpoint: Endpoint): void;
}

/**
 * Wraps a composed chain into a transport-facing endpoint.
 *
 * Every call gets a fresh context. Anything the chain throws is caught here, logged
 * as `Panic recovered: …` and answered with a 500 envelope, so a failing handler never
 * takes the process down even without `recover()` in the chain. A context nobody wrote
 * to is answered with `200` and an empty body.
 */
export function createEndpoint<T extends State>(handler: Handler<T>, services: Services<T>): Endpoint {
	return async (req, params) => {
		const ctx = new Context<T>(req, params, services);

		try {
			await handler(ctx);
		} catch (err) {
			services.logger.error("Panic recovered: %s", describeError(err));
			ctx.json(500, failure(500, "Internal Server Error"));
		}

		return ctx.writer.response ?? new Response(null, { status: 200, headers: ctx.writer.headers });
	};
}

/**
 * A set of routes sharing a path prefix and a middleware list.
 *
 * The chain of a route is fixed when the route is registered: application middlewares
 * first, then the group's, each in `use()` order. Middlewares added afterwards only
 * apply to routes registered after them.
 *
 * @example
 * ```typescript
 * const api = app.group("/api");
 * api.use(logger(), recover());
 *
 * api.get("/users/:id", (ctx) => ctx.success({ id: ctx.param("id") }));
 * api.route("/health", (ctx) => ctx.string(200, "ok")); // any method
 * ```
 */
export class Group<T extends State = State> {
	private readonly middlewares: Middleware<T>[] = [];

	constructor(
		readonly prefix: string,
		private readonly host: GroupHost<T>
	) {}

	/**
	 * Appends middlewares to the group's chain.
	 */
	use(...middlewares: Middleware<T>[]): this {
		this.middlewares.push(...middlewares);
		return this;
	}

	/**
	 * Registers `handler` at `prefix + path` for the given methods, or for every method when none are given.
	 */
	route(path: string, handler: Handler<T>, ...methods: Method[]): this {
		const chain = compose<T>(...this.host.middlewares(), ...this.middlewares);
		this.host.register(methods, joinPaths(this.prefix, path), createEndpoint(chain(handler), this.host.services));
		return this;
	}

	get(path: string, handler: Handler<T>): this {
		return this.route(path, handler, "GET");
	}

	post(path: string, handler: Handler<T>): this {
		return this.route(path, handler, "POST");
	}

	put(path: string, handler: Handler<T>): this {
		return this.route(path, handler, "PUT");
	}

	delete(path: string, handler: Handler<T>): this {
		return this.route(path, handler, "DELETE");
	}

	patch(path: string, handler: Handler<T>): this {
		return this.route(path, handler, "PATCH");
	}

	options(path: string, handler: Handler<T>): this {
		return this.route(path, handler, "OPTIONS");
	}

	head(path: string, handler: Handler<T>): this {
		return this.route(path, handler, "HEAD");
	}
}
