import { readFile, stat } from "node:fs/promises";
import { extname, join, resolve, sep } from "node:path";

// MIME types for common file extensions
const MIME_TYPES: Record<string, string> = {
	".html": "text/html; charset=utf-8",
	".htm": "text/html; charset=utf-8",
	".css": "text/css; charset=utf-8",
	".js": "text/javascript; charset=utf-8",
	".mjs": "text/javascript; charset=utf-8",
	".json": "application/json; charset=utf-8",
	".txt": "text/plain; charset=utf-8",
	".xml": "application/xml; charset=utf-8",
	".csv": "text/csv; charset=utf-8",
	".png": "image/png",
	".jpg": "image/jpeg",
	".jpeg": "image/jpeg",
	".gif": "image/gif",
	".svg": "image/svg+xml",
	".ico": "image/x-icon",
	".webp": "image/webp",
	".woff": "font/woff",
	".woff2": "font/woff2",
	".pdf": "application/pdf",
	".wasm": "application/wasm",
};

/**
 * A file read from disk, ready to be sent.
 */
export interface StaticFile {
	body: Buffer;
	contentType: string;
	lastModified: Date;
}

/**
 * MIME type for a file name, `application/octet-stream` when unknown.
 */
export function mimeType(path: string): string {
	return MIME_TYPES[extname(path).toLowerCase()] ?? "application/octet-stream";
}

/**
 * Reads a file, or the `index.html` inside a directory.
 * Resolves to null when there is nothing to send.
 */
export async function readStaticFile(path: string): Promise<StaticFile | null> {
	let filePath = path;
	try {
		let stats = await stat(filePath);
		if (stats.isDirectory()) {
			filePath = join(filePath, "index.html");
			stats = await stat(filePath);
		}
		if (!stats.isFile()) return null;

		return {
			body: await readFile(filePath),
			contentType: mimeType(filePath),
			lastModified: stats.mtime,
		};
	} catch (err) {
		if (isMissingFile(err)) return null;
		throw err;
	}
}

/**
 * Creates a file server rooted at `root`. The returned function maps a path below
 * the mount point to a response, or null when no file matches.
 * Paths escaping the root and dotfiles are refused.
 *
 * @example
 * ```typescript
 * const assets = serveStatic("./public");
 * const res = await assets("css/site.css", "GET");
 * ```
 */
export function serveStatic(root: string): (subPath: string, method: string) => Promise<Response | null> {
	const rootPath = resolve(root);

	return async (subPath, method) => {
		if (method !== "GET" && method !== "HEAD") return null;

		const segments = subPath.split("/").filter(Boolean);
		if (segments.some((segment) => segment.startsWith("."))) return null;

		const filePath = resolve(rootPath, ...segments);
		if (filePath !== rootPath && !filePath.startsWith(rootPath + sep)) return null;

		const file = await readStaticFile(filePath);
		if (!file) return null;

		return new Response(method === "HEAD" ? null : file.body, {
			status: 200,
			headers: {
				"Content-Type": file.contentType,
				"Content-Length": String(file.body.length),
				"Last-Modified": file.lastModified.toUTCString(),
			},
		});
	};
}

function isMissingFile(err: unknown): boolean {
	return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}
