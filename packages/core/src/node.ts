import type { IncomingMessage, OutgoingHttpHeaders, ServerResponse } from "node:http";
import { TLSSocket } from "node:tls";

/**
 * The part of `http.Server` that graceful shutdown relies on.
 */
export interface Closable {
	close(callback?: (err?: Error) => void): unknown;
	closeAllConnections(): void;
	closeIdleConnections(): void;
}

/**
 * Converts a Node.js request into a Web Request. The body of anything other than
 * GET and HEAD is read into memory first.
 *
 * @param signal - Fires when the client goes away
 */
export async function toWebRequest(req: IncomingMessage, signal?: AbortSignal): Promise<Request> {
	const method = req.method ?? "GET";
	const protocol = req.socket instanceof TLSSocket ? "https" : "http";
	const url = `${protocol}://${req.headers.host ?? "localhost"}${req.url ?? "/"}`;

	const headers = new Headers();
	for (const [name, value] of Object.entries(req.headers)) {
		if (value === undefined) continue;
		if (Array.isArray(value)) {
			value.forEach((v) => headers.append(name, v));
		} else {
			headers.set(name, value);
		}
	}

	let body: Buffer | null = null;
	if (method !== "GET" && method !== "HEAD") {
		const chunks: Buffer[] = [];
		await new Promise<void>((resolve, reject) => {
			req.on("data", (chunk: Buffer) => chunks.push(chunk));
			req.on("end", () => resolve());
			req.on("error", reject);
		});
		if (chunks.length > 0) body = Buffer.concat(chunks);
	}

	return new Request(url, { method, headers, body, signal });
}

/**
 * Writes a Web Response to a Node.js response. Repeated `Set-Cookie` headers are kept apart.
 * When the client goes away mid-body the body stream is cancelled and the promise resolves.
 */
export async function writeWebResponse(res: ServerResponse, response: Response): Promise<void> {
	const headers: OutgoingHttpHeaders = {};
	response.headers.forEach((value, name) => {
		if (name !== "set-cookie") headers[name] = value;
	});
	const cookies = response.headers.getSetCookie();
	if (cookies.length > 0) headers["set-cookie"] = cookies;

	res.writeHead(response.status, headers);

	if (response.body) {
		const reader = response.body.getReader();
		try {
			while (true) {
				const { done, value } = await reader.read();
				if (done) break;
				if (res.destroyed || (!res.write(value) && !(await drained(res)))) {
					await reader.cancel();
					return;
				}
			}
		} finally {
			reader.releaseLock();
		}
	}

	res.end();
}

/**
 * Resolves true once `res` drains, false if it closes first.
 */
function drained(res: ServerResponse): Promise<boolean> {
	if (res.destroyed) return Promise.resolve(false);
	return new Promise((resolve) => {
		const settle = (result: boolean) => (): void => {
			res.off("drain", onDrain);
			res.off("close", onClose);
			resolve(result);
		};
		const onDrain = settle(true);
		const onClose = settle(false);
		res.on("drain", onDrain);
		res.on("close", onClose);
	});
}

/**
 * Stops accepting connections, closes idle keep-alive sockets and waits for in-flight
 * requests. Connections still open after `graceMs` are destroyed and the promise rejects.
 */
export function shutdown(server: Closable, graceMs: number): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		const timer = setTimeout(() => {
			server.closeAllConnections();
			reject(new Error(`shutdown grace period of ${graceMs}ms exceeded`));
		}, graceMs);

		server.close((err) => {
			clearTimeout(timer);
			if (err) {
				reject(err);
			} else {
				resolve();
			}
		});
		server.closeIdleConnections();
	});
}

/**
 * Resolves with the first of `signals` the process receives.
 */
export function waitForSignal(signals: readonly NodeJS.Signals[]): Promise<NodeJS.Signals> {
	return new Promise((resolve) => {
		const listeners = signals.map((signal) => {
			const listener = (): void => {
				for (const [other, registered] of listeners) process.off(other, registered);
				resolve(signal);
			};
			process.on(signal, listener);
			return [signal, listener] as const;
		});
	});
}
