import { Type } from "@sinclair/typebox";
import { randomUUID } from "node:crypto";
import { App, createLogger, HttpError, Levels, type Middleware } from "../packages/core/src";
import { cors, logger, recover, timeout } from "../packages/middleware/src";

/**
 * Framework usage example
 *
 * Covers:
 * - Application and group middleware
 * - Typed per-request state
 * - Route parameters, query strings and request binding
 * - Envelope responses and error handling
 * - Timeouts, CORS and static files
 * - Graceful shutdown on Ctrl+C
 *
 * Run with: npm run example
 */

// Types for our application state
type AppState = {
	requestId: string;
	user: {
		id: string;
		name: string;
		role: "admin" | "user";
	};
};

interface Todo {
	id: number;
	title: string;
	done: boolean;
}

const todos = new Map<number, Todo>([
	[1, { id: 1, title: "Write the docs", done: false }],
	[2, { id: 2, title: "Ship it", done: false }],
]);
let nextId = 3;

const app = new App<AppState>({
	logger: createLogger({ level: Levels.DEBUG }),
	shutdownTimeout: 10_000,
});

// Browsers on the front-end origin may call the API.
// An App sends no CORS headers until cors() is wrapped around it.
app.wrap(
	cors({
		origin: ["http://localhost:8080"],
		exposeHeaders: ["X-Request-ID"],
	})
);

// Request ID for every request
const requestId: Middleware<AppState> = (next) => async (ctx) => {
	const id = ctx.req.headers.get("X-Request-ID") ?? randomUUID();
	ctx.set("requestId", id);
	ctx.header("X-Request-ID", id);
	await next(ctx);
};

app.use(logger({ excludePaths: ["/health"] }), recover(), requestId);

// Token check for the admin group
const requireAdmin: Middleware<AppState> = (next) => async (ctx) => {
	if (ctx.req.headers.get("Authorization") !== "Bearer admin-token") {
		ctx.error(401, "Unauthorized");
		ctx.abort();
		return;
	}
	ctx.set("user", { id: "1", name: "Admin", role: "admin" });
	await next(ctx);
};

app.group("").route("/health", (ctx) => ctx.string(200, "ok"), "GET", "HEAD");

const CreateTodo = Type.Object({
	title: Type.String({ minLength: 1, maxLength: 200 }),
	done: Type.Optional(Type.Boolean()),
});

app.add("/api/todos", (api) => {
	api.use(timeout(5_000));

	// GET /api/todos?done=true&limit=10
	api.get("/", (ctx) => {
		const done = ctx.query("done");
		const limit = Number.parseInt(ctx.queryDefault("limit", "20"), 10);

		const list = [...todos.values()].filter((todo) => done === "" || String(todo.done) === done).slice(0, limit);
		ctx.withMeta(list, { total: todos.size, requestId: ctx.mustGet("requestId") });
	});

	api.get("/:id", (ctx) => {
		const todo = todos.get(Number(ctx.param("id")));
		if (!todo) return ctx.handleError(new HttpError(404, "Todo not found"));
		ctx.success(todo);
	});

	api.post("/", async (ctx) => {
		const result = await ctx.bindAndValidate(CreateTodo, (input) => (input.title.trim() === "" ? "title must not be blank" : undefined));
		if (!result.ok) return ctx.error(400, "%s", result.error.message);

		const todo: Todo = { id: nextId++, title: result.value.title, done: result.value.done ?? false };
		todos.set(todo.id, todo);
		ctx.json(201, { success: true, data: todo });
	});

	api.delete("/:id", (ctx) => {
		if (!todos.delete(Number(ctx.param("id")))) return ctx.error(404, "todo %s not found", ctx.param("id"));
		ctx.success(null);
	});
});

app.add("/admin", (admin) => {
	admin.use(requireAdmin);

	admin.get("/whoami", (ctx) => ctx.success(ctx.mustGet("user")));

	// Deliberate failure to show recover() at work
	admin.get("/crash", () => {
		throw new Error("something broke");
	});
});

// Static files from ./public under /assets
app.static("/assets", "./public");

app.onNotFound((ctx) => ctx.error(404, "no route for %s %s", ctx.req.method, ctx.path));

for (const route of app.routes()) {
	app.logger.debug("route %s", route);
}

await app.run(3000);
