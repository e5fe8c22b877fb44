import { format } from "node:util";
import { parse as parseCookie, serialize as serializeCookie, type SerializeOptions } from "cookie";
import { TypeGuard, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { BindError, ContextKeyError, describeError } from "./errors";
import { failure, ok, type ResponseBody } from "./response";
import { pathnameOf } from "./router";
import { readStaticFile } from "./static";
import type { Logger, Services, State } from "./types";

/**
 * Outcome of `ctx.bind()`: the decoded value, or why decoding failed.
 */
export type BindResult<V> = { ok: true; value: V } | { ok: false; error: BindError };

/**
 * Extra check run by `ctx.bindAndValidate()`. Returns an error message, or undefined when the value is fine.
 */
export type Validator<V> = (value: V) => string | undefined;

/**
 * Single-writer response slot. The first write commits; later ones are refused.
 */
export class ResponseWriter {
	/** Headers sent with whichever response gets written */
	readonly headers = new Headers();
	private committed?: Response;

	/** True once a response has been written */
	get written(): boolean {
		return this.committed !== undefined;
	}

	/** The committed response, if any */
	get response(): Response | undefined {
		return this.committed;
	}

	/**
	 * Commits `body` with the pending headers. Returns false when a response was already written.
	 */
	write(body: ResponseBody, status: number, headers: Record<string, string> = {}): boolean {
		if (this.committed) return false;

		const allHeaders = new Headers(this.headers);
		for (const [name, value] of Object.entries(headers)) {
			allHeaders.set(name, value);
		}
		this.committed = new Response(body, { status, headers: allHeaders });
		return true;
	}
}

/**
 * Per-request state carrier threaded through every middleware and the handler.
 *
 * A context is created for one request and discarded once it has been answered.
 * It holds the request, the response writer, the path parameters, a key/value
 * store for middleware-to-handler communication and an advisory abort flag.
 * Exactly one response may be written; later writes are discarded and logged.
 *
 * @template T - Shape of the key/value store
 *
 * @example
 * ```typescript
 * interface AppState {
 *   [key: string]: unknown;
 *   user: { id: string; name: string };
 * }
 *
 * const auth: Middleware<AppState> = (next) => async (ctx) => {
 *   const user = await sessions.lookup(ctx.cookie("session"));
 *   if (!user) {
 *     ctx.error(401, "Unauthorized");
 *     ctx.abort();
 *     return;
 *   }
 *   ctx.set("user", user);
 *   await next(ctx);
 * };
 *
 * api.use(auth).get("/me", (ctx) => ctx.success(ctx.mustGet("user")));
 * ```
 */
export class Context<T extends State = State> {
	/** Path parameters extracted by the router, frozen on creation */
	readonly params: Readonly<Record<string, string>>;

	/** Response slot for this request */
	readonly writer = new ResponseWriter();

	/**
	 * Cancellation scope of the request. Middleware that derives a tighter
	 * scope (such as the timeout middleware) replaces it for inner layers.
	 */
	signal: AbortSignal;

	private readonly store: { [K in keyof T]?: { value: T[K] } } = Object.create(null);
	private aborted = false;
	private searchParams?: URLSearchParams;

	constructor(
		readonly req: Request,
		params: Record<string, string>,
		private readonly services: Services<T>
	) {
		this.params = Object.freeze({ ...params });
		this.signal = req.signal;
	}

	/** Shared application logger */
	get logger(): Logger {
		return this.services.logger;
	}

	/** Path of the request URL, without query string */
	get path(): string {
		return pathnameOf(this.req.url);
	}

	/**
	 * Stores a value for later middleware or the handler. Overwrites any previous value.
	 */
	set<K extends keyof T>(key: K, value: T[K]): void {
		this.store[key] = { value };
	}

	/**
	 * Reads a stored value together with whether it was set.
	 *
	 * @example
	 * ```typescript
	 * const [user, found] = ctx.get("user");
	 * if (found) greet(user.name);
	 * ```
	 */
	get<K extends keyof T>(key: K): [value: T[K], found: true] | [value: undefined, found: false] {
		const entry = this.store[key];
		if (!entry) return [undefined, false];
		return [entry.value, true];
	}

	/**
	 * Reads a stored value, throwing {@link ContextKeyError} when it was never set.
	 * The error is caught by `recover()` or the dispatch safety net like any other throw.
	 */
	mustGet<K extends keyof T>(key: K): T[K] {
		const [value, found] = this.get(key);
		if (found) return value;
		throw new ContextKeyError(String(key));
	}

	has(key: keyof T): boolean {
		return this.store[key] !== undefined;
	}

	/**
	 * Path parameter by name, empty string when absent.
	 */
	param(name: string): string {
		return this.params[name] ?? "";
	}

	/**
	 * First query parameter with the given name, empty string when absent.
	 */
	query(name: string): string {
		this.searchParams ??= new URL(this.req.url, "http://localhost").searchParams;
		return this.searchParams.get(name) ?? "";
	}

	/**
	 * Query parameter, or `fallback` when it is absent or empty.
	 */
	queryDefault(name: string, fallback: string): string {
		return this.query(name) || fallback;
	}

	/**
	 * Marks the request as aborted. Advisory only: middleware must check
	 * {@link isAborted} and decide not to call onward.
	 */
	abort(): void {
		this.aborted = true;
	}

	isAborted(): boolean {
		return this.aborted;
	}

	/**
	 * Sets a header on whichever response gets written.
	 */
	header(name: string, value: string): void {
		this.writer.headers.set(name, value);
	}

	/**
	 * Value of a request cookie, undefined when not sent.
	 */
	cookie(name: string): string | undefined {
		const header = this.req.headers.get("Cookie");
		if (!header) return undefined;
		return parseCookie(header)[name];
	}

	/**
	 * Adds a `Set-Cookie` header to the response.
	 *
	 * @example
	 * ```typescript
	 * ctx.setCookie("session", token, { httpOnly: true, sameSite: "lax", maxAge: 3600 });
	 * ```
	 */
	setCookie(name: string, value: string, options: SerializeOptions = {}): void {
		this.writer.headers.append("Set-Cookie", serializeCookie(name, value, options));
	}

	/**
	 * Decodes the JSON request body and checks it against `schema`.
	 * Fields an object schema does not declare, at any depth, are refused unless that
	 * object schema sets `additionalProperties` itself. Never throws for bad input.
	 *
	 * @example
	 * ```typescript
	 * const CreateUser = Type.Object({ name: Type.String(), age: Type.Integer() });
	 *
	 * const result = await ctx.bind(CreateUser);
	 * if (!result.ok) return ctx.error(400, "%s", result.error.message);
	 * ctx.success(await users.create(result.value));
	 * ```
	 */
	async bind<S extends TSchema>(schema: S): Promise<BindResult<Static<S>>> {
		let raw: string;
		try {
			raw = await this.req.text();
		} catch (err) {
			return { ok: false, error: new BindError(`unreadable request body: ${describeError(err)}`) };
		}
		if (raw.trim() === "") return { ok: false, error: new BindError("empty request body") };

		let decoded: unknown;
		try {
			decoded = JSON.parse(raw);
		} catch (err) {
			return { ok: false, error: new BindError(`malformed JSON: ${err instanceof Error ? err.message : String(err)}`) };
		}

		const unknownFields = findUnknownFields(schema, decoded);
		if (unknownFields.length > 0) {
			const details = unknownFields.map((field) => `unknown field "${field}"`);
			return { ok: false, error: new BindError(details[0], details) };
		}

		if (!Value.Check(schema, decoded)) {
			const details = [...Value.Errors(schema, decoded)].map((error) => `${error.path || "/"}: ${error.message}`);
			return { ok: false, error: new BindError(details[0] ?? "invalid request body", details) };
		}

		return { ok: true, value: decoded };
	}

	/**
	 * {@link bind}, then each validator in order. The first message returned fails the bind.
	 *
	 * @example
	 * ```typescript
	 * const result = await ctx.bindAndValidate(Signup, (v) => (v.password === v.confirm ? undefined : "passwords differ"));
	 * ```
	 */
	async bindAndValidate<S extends TSchema>(schema: S, ...validators: Validator<Static<S>>[]): Promise<BindResult<Static<S>>> {
		const result = await this.bind(schema);
		if (!result.ok) return result;

		for (const validate of validators) {
			const message = validate(result.value);
			if (message !== undefined) return { ok: false, error: new BindError(message) };
		}
		return result;
	}

	/**
	 * Sends `data` as JSON. An encoding failure is logged and the status is sent with an empty body.
	 */
	json(status: number, data: unknown): void {
		let body: string | null;
		try {
			body = JSON.stringify(data) ?? null;
		} catch (err) {
			this.logger.error("Error encoding JSON: %s", describeError(err));
			body = null;
		}
		this.commit(body, status, { "Content-Type": "application/json" });
	}

	/**
	 * Sends `{"success":true,"data":…}` with status 200.
	 */
	success(data: unknown): void {
		this.json(200, ok(data));
	}

	/**
	 * Sends `{"success":false,"error":{"code":status,"message":…}}`.
	 * The message is printf-style formatted with `args`.
	 *
	 * @example
	 * ```typescript
	 * ctx.error(404, "user %s not found", ctx.param("id"));
	 * ```
	 */
	error(status: number, message: string, ...args: unknown[]): void {
		this.json(status, failure(status, args.length > 0 ? format(message, ...args) : message));
	}

	/**
	 * Sends a success envelope carrying `meta` alongside the data.
	 */
	withMeta(data: unknown, meta: unknown): void {
		this.json(200, ok(data, meta));
	}

	/**
	 * Sends a printf-style formatted `text/plain` body.
	 */
	string(status: number, message: string, ...args: unknown[]): void {
		this.commit(args.length > 0 ? format(message, ...args) : message, status, { "Content-Type": "text/plain" });
	}

	html(status: number, html: string): void {
		this.commit(html, status, { "Content-Type": "text/html" });
	}

	/**
	 * Redirects to `location` with the given 3xx status.
	 */
	redirect(status: number, location: string): void {
		this.commit(null, status, { Location: location });
	}

	/**
	 * Sends a file from disk, or `index.html` for a directory. Answers 404 when nothing is there.
	 */
	async file(path: string): Promise<void> {
		const file = await readStaticFile(path);
		if (!file) {
			this.error(404, "Not Found");
			return;
		}
		this.commit(this.req.method === "HEAD" ? null : file.body, 200, {
			"Content-Type": file.contentType,
			"Last-Modified": file.lastModified.toUTCString(),
		});
	}

	/**
	 * Passes `err` to the application's error handler.
	 */
	handleError(err: unknown): void {
		this.services.errorHandler.handle(this, err);
	}

	/**
	 * Logs the request line at info level.
	 */
	logRequest(): void {
		this.logger.info("%s %s", this.req.method, this.path);
	}

	private commit(body: ResponseBody, status: number, headers: Record<string, string>): void {
		if (this.aborted) {
			this.logger.debug("Response written after abort: %d %s %s", status, this.req.method, this.path);
		}
		if (!this.writer.write(body, status, headers)) {
			this.logger.error("Superfluous response write discarded: %d %s %s", status, this.req.method, this.path);
		}
	}
}

/**
 * Paths of fields in `value` that an object schema does not declare, at any depth.
 * Nested fields are dotted (`user.admin`), array items indexed (`tags[1].x`).
 */
function findUnknownFields(schema: TSchema, value: unknown, path = ""): string[] {
	if (TypeGuard.IsArray(schema)) {
		if (!Array.isArray(value)) return [];
		return value.flatMap((item, index) => findUnknownFields(schema.items, item, `${path}[${index}]`));
	}
	if (!TypeGuard.IsObject(schema) || !isRecord(value)) return [];

	const found: string[] = [];
	for (const [field, fieldValue] of Object.entries(value)) {
		const fieldPath = path ? `${path}.${field}` : field;
		if (Object.hasOwn(schema.properties, field)) {
			found.push(...findUnknownFields(schema.properties[field], fieldValue, fieldPath));
		} else if (schema.additionalProperties === undefined) {
			found.push(fieldPath);
		}
	}
	return found;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}
