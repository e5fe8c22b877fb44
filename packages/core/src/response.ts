import type { Envelope } from "./types";

/** Anything a Response can be built from */
export type ResponseBody = ConstructorParameters<typeof Response>[0];

/**
 * Builds a success envelope. `data` and `meta` are left out when absent.
 *
 * @example
 * ```typescript
 * ok([1, 2]);               // { success: true, data: [1, 2] }
 * ok([1, 2], { total: 2 }); // { success: true, data: [1, 2], meta: { total: 2 } }
 * ```
 */
export function ok<D, M = never>(data?: D, meta?: M): Envelope<D, M> {
	const envelope: Envelope<D, M> = { success: true };
	if (isPresent(data)) envelope.data = data;
	if (isPresent(meta)) envelope.meta = meta;
	return envelope;
}

/**
 * Builds an error envelope.
 *
 * @example
 * ```typescript
 * failure(404, "Not Found"); // { success: false, error: { code: 404, message: "Not Found" } }
 * ```
 */
export function failure(code: number, message: string): Envelope<never, never> {
	return { success: false, error: { code, message } };
}

/**
 * Standalone JSON envelope response, for code that has no context at hand.
 */
export function envelopeResponse(status: number, envelope: Envelope<unknown, unknown>, headers?: Record<string, string>): Response {
	const allHeaders = new Headers(headers);
	allHeaders.set("Content-Type", "application/json");
	return new Response(JSON.stringify(envelope), { status, headers: allHeaders });
}

function isPresent<V>(value: V | undefined | null): value is V {
	return value !== undefined && value !== null;
}
