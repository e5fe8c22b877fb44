import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { App, defaultAppConfig, HttpError, type Middleware } from "../packages/core/src";
import { MemoryLogger, mockRequest } from "./helpers";

function createApp() {
	const log = new MemoryLogger();
	return { app: new App({ logger: log }), log };
}

function trace(name: string, events: string[]): Middleware {
	return (next) => async (ctx) => {
		events.push(`${name}:in`);
		await next(ctx);
		events.push(`${name}:out`);
	};
}

describe("Web Framework", () => {
	describe("Basic Routing", () => {
		it("should handle GET requests", async () => {
			const { app } = createApp();
			app.group("").get("/hello", (ctx) => ctx.string(200, "Hello World"));

			const res = await app.handle(mockRequest("/hello"));
			expect(res.status).toBe(200);
			expect(res.headers.get("Content-Type")).toBe("text/plain");
			expect(await res.text()).toBe("Hello World");
		});

		it("should prefix routes with the group path", async () => {
			const { app } = createApp();
			app.group("/api/v1").post("/users", (ctx) => ctx.json(201, { created: true }));

			const res = await app.handle(mockRequest("/api/v1/users", "POST"));
			expect(res.status).toBe(201);
			expect(await res.text()).toBe('{"created":true}');
		});

		it("should extract route parameters", async () => {
			const { app } = createApp();
			app.group("/users").get("/:id", (ctx) => ctx.success({ id: ctx.param("id") }));

			const res = await app.handle(mockRequest("/users/42"));
			expect(await res.text()).toBe('{"success":true,"data":{"id":"42"}}');
		});

		it("should decode route parameters", async () => {
			const { app } = createApp();
			app.group("").get("/tags/:name", (ctx) => ctx.string(200, ctx.param("name")));

			const res = await app.handle(mockRequest("/tags/hello%20world"));
			expect(await res.text()).toBe("hello world");
		});

		it("should capture the rest of the path with a wildcard", async () => {
			const { app } = createApp();
			app.group("").get("/files/*", (ctx) => ctx.string(200, "[%s]", ctx.param("*")));

			expect(await (await app.handle(mockRequest("/files/docs/readme.md"))).text()).toBe("[docs/readme.md]");
			expect(await (await app.handle(mockRequest("/files"))).text()).toBe("[]");
		});

		it("should prefer static segments over parameters", async () => {
			const { app } = createApp();
			const users = app.group("/users");
			users.get("/:id", (ctx) => ctx.string(200, "user %s", ctx.param("id")));
			users.get("/me", (ctx) => ctx.string(200, "current user"));

			expect(await (await app.handle(mockRequest("/users/me"))).text()).toBe("current user");
			expect(await (await app.handle(mockRequest("/users/7"))).text()).toBe("user 7");
		});

		it("should ignore trailing slashes", async () => {
			const { app } = createApp();
			app.group("").get("/users", (ctx) => ctx.string(200, "list"));

			const res = await app.handle(mockRequest("/users/"));
			expect(res.status).toBe(200);
			expect(await res.text()).toBe("list");
		});

		it("should answer every method on a route registered without methods", async () => {
			const { app } = createApp();
			app.group("").route("/any", (ctx) => ctx.string(200, ctx.req.method));

			expect(await (await app.handle(mockRequest("/any", "POST"))).text()).toBe("POST");
			expect(await (await app.handle(mockRequest("/any", "DELETE"))).text()).toBe("DELETE");
		});

		it("should register a route for several methods", async () => {
			const { app } = createApp();
			app.group("").route("/items", (ctx) => ctx.string(200, "ok"), "PUT", "PATCH");

			expect((await app.handle(mockRequest("/items", "PUT"))).status).toBe(200);
			expect((await app.handle(mockRequest("/items", "PATCH"))).status).toBe(200);
			expect((await app.handle(mockRequest("/items", "GET"))).status).toBe(405);
		});

		it("should set up groups with add()", async () => {
			const { app } = createApp();
			app.add("/admin", (admin) => {
				admin.get("/stats", (ctx) => ctx.success({ users: 3 }));
			});

			const res = await app.handle(mockRequest("/admin/stats"));
			expect(await res.text()).toBe('{"success":true,"data":{"users":3}}');
		});

		it("should keep handle() usable when detached from the app", async () => {
			const { app } = createApp();
			app.group("").get("/", (ctx) => ctx.string(200, "root"));

			const { handle } = app;
			expect(await (await handle(mockRequest("/"))).text()).toBe("root");
		});
	});

	describe("Not Found and Method Not Allowed", () => {
		it("should answer unknown paths with a 404 envelope", async () => {
			const { app } = createApp();

			const res = await app.handle(mockRequest("/missing"));
			expect(res.status).toBe(404);
			expect(res.headers.get("Content-Type")).toBe("application/json");
			expect(await res.text()).toBe('{"success":false,"error":{"code":404,"message":"Not Found"}}');
		});

		it("should answer a known path with the wrong method with 405", async () => {
			const { app } = createApp();
			app.group("").get("/items", (ctx) => ctx.success([]));

			const res = await app.handle(mockRequest("/items", "POST"));
			expect(res.status).toBe(405);
			expect(res.headers.get("Allow")).toBe("GET, HEAD");
			expect(await res.text()).toBe('{"success":false,"error":{"code":405,"message":"Method Not Allowed"}}');
		});

		it("should run a custom not-found handler", async () => {
			const { app } = createApp();
			app.onNotFound((ctx) => ctx.error(404, "no route for %s", ctx.path));

			const res = await app.handle(mockRequest("/nowhere?x=1"));
			expect(res.status).toBe(404);
			expect(await res.text()).toBe('{"success":false,"error":{"code":404,"message":"no route for /nowhere"}}');
		});
	});

	describe("HEAD requests", () => {
		it("should serve HEAD from the GET route without a body", async () => {
			const { app } = createApp();
			app.group("").get("/hello", (ctx) => ctx.string(200, "Hello World"));

			const res = await app.handle(mockRequest("/hello", "HEAD"));
			expect(res.status).toBe(200);
			expect(res.headers.get("Content-Type")).toBe("text/plain");
			expect(res.body).toBeNull();
		});
	});

	describe("Middleware chain", () => {
		it("should run application middlewares outside group middlewares", async () => {
			const { app } = createApp();
			const events: string[] = [];
			app.use(trace("a1", events), trace("a2", events));

			const api = app.group("/api");
			api.use(trace("g1", events));
			api.get("/ping", (ctx) => {
				events.push("handler");
				ctx.string(200, "pong");
			});

			await app.handle(mockRequest("/api/ping"));
			expect(events).toEqual(["a1:in", "a2:in", "g1:in", "handler", "g1:out", "a2:out", "a1:out"]);
		});

		it("should include application middlewares added after the group was created", async () => {
			const { app } = createApp();
			const events: string[] = [];
			const api = app.group("/api");
			app.use(trace("late", events));
			api.get("/ping", (ctx) => ctx.string(200, "pong"));

			await app.handle(mockRequest("/api/ping"));
			expect(events).toEqual(["late:in", "late:out"]);
		});

		it("should fix the chain when the route is registered", async () => {
			const { app } = createApp();
			const events: string[] = [];
			const api = app.group("/api");
			api.get("/before", (ctx) => ctx.string(200, "before"));
			api.use(trace("group", events));
			app.use(trace("app", events));
			api.get("/after", (ctx) => ctx.string(200, "after"));

			await app.handle(mockRequest("/api/before"));
			expect(events).toEqual([]);

			await app.handle(mockRequest("/api/after"));
			expect(events).toEqual(["app:in", "group:in", "group:out", "app:out"]);
		});

		it("should give every request its own store", async () => {
			const log = new MemoryLogger();
			const app = new App<{ visits: number }>({ logger: log });
			app.use((next) => async (ctx) => {
				const [visits, found] = ctx.get("visits");
				ctx.set("visits", found ? visits + 1 : 1);
				await next(ctx);
			});
			app.group("").get("/count", (ctx) => ctx.success(ctx.mustGet("visits")));

			expect(await (await app.handle(mockRequest("/count"))).text()).toBe('{"success":true,"data":1}');
			expect(await (await app.handle(mockRequest("/count"))).text()).toBe('{"success":true,"data":1}');
		});

		it("should stop the chain when a middleware does not call next", async () => {
			const { app } = createApp();
			const reached: string[] = [];
			const api = app.group("");
			api.use((next) => async (ctx) => {
				if (!ctx.req.headers.get("Authorization")) {
					ctx.error(401, "Unauthorized");
					ctx.abort();
					return;
				}
				await next(ctx);
			});
			api.get("/secret", (ctx) => {
				reached.push("handler");
				ctx.success("classified");
			});

			const res = await app.handle(mockRequest("/secret"));
			expect(res.status).toBe(401);
			expect(await res.text()).toBe('{"success":false,"error":{"code":401,"message":"Unauthorized"}}');
			expect(reached).toEqual([]);
		});
	});

	describe("Safety net", () => {
		it("should turn a thrown error into a 500 envelope and keep serving", async () => {
			const { app, log } = createApp();
			const api = app.group("");
			api.get("/boom", () => {
				throw new Error("boom");
			});
			api.get("/ok", (ctx) => ctx.string(200, "fine"));

			const res = await app.handle(mockRequest("/boom"));
			expect(res.status).toBe(500);
			expect(await res.text()).toBe('{"success":false,"error":{"code":500,"message":"Internal Server Error"}}');
			expect(log.messages("error")).toEqual(["Panic recovered: Error: boom"]);

			const next = await app.handle(mockRequest("/ok"));
			expect(next.status).toBe(200);
			expect(await next.text()).toBe("fine");
		});

		it("should catch rejected promises", async () => {
			const { app, log } = createApp();
			app.group("").get("/reject", async () => {
				await Promise.resolve();
				throw "plain string";
			});

			const res = await app.handle(mockRequest("/reject"));
			expect(res.status).toBe(500);
			expect(log.messages("error")).toEqual(["Panic recovered: plain string"]);
		});

		it("should answer 200 with an empty body when nothing was written", async () => {
			const { app } = createApp();
			app.group("").get("/silent", (ctx) => ctx.header("X-Trace", "abc"));

			const res = await app.handle(mockRequest("/silent"));
			expect(res.status).toBe(200);
			expect(res.headers.get("X-Trace")).toBe("abc");
			expect(await res.text()).toBe("");
		});
	});

	describe("Error handler", () => {
		it("should answer handleError() with the error text by default", async () => {
			const { app } = createApp();
			app.group("").get("/fail", (ctx) => ctx.handleError(new Error("database unavailable")));

			const res = await app.handle(mockRequest("/fail"));
			expect(res.status).toBe(500);
			expect(await res.text()).toBe('{"success":false,"error":{"code":500,"message":"database unavailable"}}');
		});

		it("should keep the status of an HttpError", async () => {
			const { app } = createApp();
			app.group("").get("/users/:id", (ctx) => ctx.handleError(new HttpError(404, "User not found")));

			const res = await app.handle(mockRequest("/users/9"));
			expect(res.status).toBe(404);
			expect(await res.text()).toBe('{"success":false,"error":{"code":404,"message":"User not found"}}');
		});

		it("should use a replaced error handler for existing routes", async () => {
			const { app } = createApp();
			app.group("").get("/fail", (ctx) => ctx.handleError(new Error("nope")));
			app.setErrorHandler({
				handle: (ctx, err) => ctx.error(422, "rejected: %s", err instanceof Error ? err.message : "unknown"),
			});

			const res = await app.handle(mockRequest("/fail"));
			expect(res.status).toBe(422);
			expect(await res.text()).toBe('{"success":false,"error":{"code":422,"message":"rejected: nope"}}');
		});

		it("should log through a replaced logger", async () => {
			const { app, log } = createApp();
			app.group("").get("/boom", () => {
				throw new Error("late");
			});
			const replacement = new MemoryLogger();
			app.setLogger(replacement);

			await app.handle(mockRequest("/boom"));
			expect(app.logger).toBe(replacement);
			expect(log.logs).toEqual([]);
			expect(replacement.messages("error")).toEqual(["Panic recovered: Error: late"]);
		});
	});

	describe("Transport wrappers", () => {
		it("should wrap every request, including 404s", async () => {
			const { app } = createApp();
			app.wrap((next) => async (req) => {
				const res = await next(req);
				const headers = new Headers(res.headers);
				headers.set("X-Wrapped", "yes");
				return new Response(res.body, { status: res.status, headers });
			});

			const res = await app.handle(mockRequest("/missing"));
			expect(res.status).toBe(404);
			expect(res.headers.get("X-Wrapped")).toBe("yes");
		});

		it("should apply wrappers outermost first", async () => {
			const { app } = createApp();
			const events: string[] = [];
			const wrapper = (name: string) => (next: (req: Request) => Promise<Response>) => async (req: Request) => {
				events.push(`${name}:in`);
				const res = await next(req);
				events.push(`${name}:out`);
				return res;
			};
			app.wrap(wrapper("outer"));
			app.wrap(wrapper("inner"));
			app.group("").get("/", (ctx) => ctx.string(200, "ok"));

			await app.handle(mockRequest("/"));
			expect(events).toEqual(["outer:in", "inner:in", "inner:out", "outer:out"]);
		});

		it("should turn a failing wrapper into a 500 envelope", async () => {
			const { app, log } = createApp();
			app.wrap(() => async () => {
				throw new Error("transport failed");
			});

			const res = await app.handle(mockRequest("/"));
			expect(res.status).toBe(500);
			expect(await res.text()).toBe('{"success":false,"error":{"code":500,"message":"Internal Server Error"}}');
			expect(log.messages("error")).toEqual(["Error handling request: Error: transport failed"]);
		});
	});

	describe("Static files", () => {
		let dir: string;

		beforeAll(async () => {
			dir = await mkdtemp(join(tmpdir(), "weft-static-"));
			await writeFile(join(dir, "hello.txt"), "hi there");
			await writeFile(join(dir, ".env"), "SECRET=test-secret");
			await mkdir(join(dir, "docs"));
			await writeFile(join(dir, "docs", "index.html"), "<h1>Docs</h1>");
		});

		afterAll(async () => {
			await rm(dir, { recursive: true, force: true });
		});

		it("should serve a file with its MIME type", async () => {
			const { app } = createApp();
			app.static("/assets", dir);

			const res = await app.handle(mockRequest("/assets/hello.txt"));
			expect(res.status).toBe(200);
			expect(res.headers.get("Content-Type")).toBe("text/plain; charset=utf-8");
			expect(res.headers.get("Content-Length")).toBe("8");
			expect(await res.text()).toBe("hi there");
		});

		it("should serve index.html for a directory", async () => {
			const { app } = createApp();
			app.static("/assets", dir);

			const res = await app.handle(mockRequest("/assets/docs"));
			expect(res.headers.get("Content-Type")).toBe("text/html; charset=utf-8");
			expect(await res.text()).toBe("<h1>Docs</h1>");
		});

		it("should answer HEAD without a body", async () => {
			const { app } = createApp();
			app.static("/assets", dir);

			const res = await app.handle(mockRequest("/assets/hello.txt", "HEAD"));
			expect(res.status).toBe(200);
			expect(res.headers.get("Content-Length")).toBe("8");
			expect(res.body).toBeNull();
		});

		it("should answer 404 for missing files and dotfiles", async () => {
			const { app } = createApp();
			app.static("/assets", dir);

			expect((await app.handle(mockRequest("/assets/missing.txt"))).status).toBe(404);
			expect((await app.handle(mockRequest("/assets/.env"))).status).toBe(404);
		});

		it("should bypass the middleware chain", async () => {
			const { app } = createApp();
			const events: string[] = [];
			app.use(trace("mw", events));
			app.static("/assets", dir);

			await app.handle(mockRequest("/assets/hello.txt"));
			expect(events).toEqual([]);
		});
	});

	describe("Route listing", () => {
		it("should list registrations in order", () => {
			const { app } = createApp();
			const api = app.group("/api");
			api.get("/users", (ctx) => ctx.success([]));
			api.route("/users/:id", (ctx) => ctx.success(null), "PUT", "DELETE");
			app.group("").route("/health", (ctx) => ctx.string(200, "ok"));
			app.static("/assets", "./public");

			expect(app.routes()).toEqual(["/api/users [GET]", "/api/users/:id [PUT,DELETE]", "/health []", "/assets/* [GET,HEAD]"]);
		});
	});

	describe("Configuration", () => {
		it("should provide defaults", () => {
			const config = defaultAppConfig();
			expect(config.readTimeout).toBe(15_000);
			expect(config.writeTimeout).toBe(15_000);
			expect(config.shutdownTimeout).toBe(5_000);
			expect(config.hostname).toBe("localhost");
		});

		it("should merge a partial config over the defaults", () => {
			const log = new MemoryLogger();
			const app = new App({ logger: log, shutdownTimeout: 100 });

			expect(app.logger).toBe(log);
			expect(app.config.shutdownTimeout).toBe(100);
			expect(app.config.readTimeout).toBe(15_000);
		});
	});
});
