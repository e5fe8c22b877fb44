import { format } from "node:util";
import type { Logger } from "../packages/core/src";

type Level = "info" | "error" | "debug";

/**
 * Logger that keeps formatted lines in memory.
 */
export class MemoryLogger implements Logger {
	public logs: Array<{ level: Level; message: string }> = [];

	info(message: string, ...args: unknown[]): void {
		this.logs.push({ level: "info", message: format(message, ...args) });
	}

	error(message: string, ...args: unknown[]): void {
		this.logs.push({ level: "error", message: format(message, ...args) });
	}

	debug(message: string, ...args: unknown[]): void {
		this.logs.push({ level: "debug", message: format(message, ...args) });
	}

	messages(level?: Level): string[] {
		return this.logs.filter((log) => level === undefined || log.level === level).map((log) => log.message);
	}

	clear(): void {
		this.logs = [];
	}
}

export function mockRequest(path: string, method = "GET", init: { headers?: Record<string, string>; body?: string } = {}): Request {
	return new Request(`http://localhost${path}`, {
		method,
		headers: { Host: "localhost", ...init.headers },
		body: init.body,
	});
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
	const deadline = Date.now() + timeoutMs;
	while (!condition()) {
		if (Date.now() > deadline) throw new Error(`condition not met within ${timeoutMs}ms`);
		await sleep(5);
	}
}
