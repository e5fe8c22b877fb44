import { describe, expect, it } from "vitest";
import { compose, composeTransport, Context, DefaultErrorHandler, type Handler, type Middleware } from "../packages/core/src";
import { MemoryLogger } from "./helpers";

function trace(name: string, events: string[]): Middleware {
	return (next) => async (ctx) => {
		events.push(`${name}:in`);
		await next(ctx);
		events.push(`${name}:out`);
	};
}

describe("compose", () => {
	it("should nest middlewares with the first one outermost", async () => {
		const events: string[] = [];
		const handler: Handler = () => {
			events.push("handler");
		};

		const composed = compose(trace("m0", events), trace("m1", events), trace("m2", events))(handler);
		await composed(new Context(new Request("http://localhost/"), {}, { logger: new MemoryLogger(), errorHandler: new DefaultErrorHandler() }));

		expect(events).toEqual(["m0:in", "m1:in", "m2:in", "handler", "m2:out", "m1:out", "m0:out"]);
	});

	it("should return the handler itself when there are no middlewares", () => {
		const handler: Handler = () => undefined;
		expect(compose()(handler)).toBe(handler);
	});

	it("should call each middleware factory once per composition", () => {
		let factoryCalls = 0;
		const counting: Middleware = (next) => {
			factoryCalls++;
			return next;
		};

		compose(counting, counting)(() => undefined);
		expect(factoryCalls).toBe(2);
	});
});

describe("composeTransport", () => {
	it("should nest transport wrappers with the first one outermost", async () => {
		const events: string[] = [];
		const wrapper = (name: string) => (next: (req: Request) => Promise<Response>) => async (req: Request) => {
			events.push(name);
			return next(req);
		};

		const fetchHandler = composeTransport(wrapper("outer"), wrapper("inner"))(async () => new Response("done"));
		const res = await fetchHandler(new Request("http://localhost/"));

		expect(events).toEqual(["outer", "inner"]);
		expect(await res.text()).toBe("done");
	});
});
