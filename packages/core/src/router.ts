import type { Method } from "./types";

/** All methods a route without an explicit method list answers to */
export const METHODS: readonly Method[] = ["GET", "POST", "PUT", "DELETE", "PATCH", "OPTIONS", "HEAD"];

/** Frozen empty object used as params when a route has none */
const EMPTY_PARAMS: Readonly<Record<string, string>> = Object.freeze({});

/**
 * A node in the trie used for route matching.
 * Each node represents a path segment and can have static children, one parameter child and one wildcard child.
 */
class TrieNode<E> {
	/** Static path segments to their child nodes */
	children = new Map<string, TrieNode<E>>();
	/** Parameter child with its parameter name (for ":id" segments) */
	paramChild?: { node: TrieNode<E>; name: string };
	/** Wildcard child (for a trailing "*" that matches the remaining segments) */
	wildcardChild?: TrieNode<E>;
	/** Endpoint stored when this node completes a route */
	entry?: E;

	constructor(public segment?: string) {}
}

/**
 * Result of looking up a method and path.
 */
export type Lookup<E> =
	| { status: "found"; entry: E; params: Readonly<Record<string, string>> }
	| { status: "method-not-allowed"; allowed: Method[] }
	| { status: "not-found" };

/**
 * A registered route, as reported by {@link RouteTable.list}.
 */
export interface RouteInfo {
	path: string;
	/** Empty when the route answers to any method */
	methods: Method[];
}

/**
 * Method + path pattern table with a trie per method.
 * Patterns support static segments, `:name` parameters and a trailing `*` wildcard.
 * Trailing slashes are not significant.
 *
 * @example
 * ```typescript
 * const table = new RouteTable<string>();
 * table.add(["GET"], "/users/:id", "show-user");
 * table.lookup("GET", "/users/42");
 * // { status: "found", entry: "show-user", params: { id: "42" } }
 * ```
 */
export class RouteTable<E> {
	/** One trie per method, created on first use */
	private roots = new Map<string, TrieNode<E>>();
	/** Routes registered without a method list */
	private anyRoot = new TrieNode<E>();
	/** Registrations in order, for listing */
	private registrations: RouteInfo[] = [];

	/**
	 * Registers an entry. An empty method list registers it for every method.
	 * A later registration of the same method and pattern replaces the earlier one.
	 */
	add(methods: readonly Method[], path: string, entry: E): void {
		if (methods.length === 0) {
			this.insert(this.anyRoot, path, entry);
		} else {
			for (const method of methods) {
				this.insert(this.rootFor(method), path, entry);
			}
		}
		this.registrations.push({ path, methods: [...methods] });
	}

	/**
	 * Resolves a method and path to an entry and its decoded parameters.
	 * A HEAD request falls back to the GET route of the same path, so HEAD is allowed wherever GET is.
	 */
	lookup(method: string, path: string): Lookup<E> {
		const segments = splitPath(path);

		const direct = this.match(method, segments) ?? (method === "HEAD" ? this.match("GET", segments) : null) ?? matchTrie(this.anyRoot, segments);
		if (direct) return { status: "found", entry: direct.entry, params: direct.params };

		const allowed = METHODS.filter(
			(other) => other !== method && (this.match(other, segments) !== null || (other === "HEAD" && this.match("GET", segments) !== null)),
		);
		if (allowed.length > 0) return { status: "method-not-allowed", allowed };

		return { status: "not-found" };
	}

	/**
	 * Lists registrations in the order they were made.
	 */
	list(): RouteInfo[] {
		return this.registrations.map((route) => ({ path: route.path, methods: [...route.methods] }));
	}

	private match(method: string, segments: string[]): { entry: E; params: Readonly<Record<string, string>> } | null {
		const root = this.roots.get(method);
		return root ? matchTrie(root, segments) : null;
	}

	private rootFor(method: Method): TrieNode<E> {
		let root = this.roots.get(method);
		if (!root) {
			root = new TrieNode<E>();
			this.roots.set(method, root);
		}
		return root;
	}

	private insert(root: TrieNode<E>, path: string, entry: E): void {
		let node = root;

		for (const segment of splitPath(path)) {
			if (segment === "*") {
				node.wildcardChild ??= new TrieNode<E>("*");
				node = node.wildcardChild;
				break;
			} else if (segment.startsWith(":")) {
				node.paramChild ??= { node: new TrieNode<E>(segment), name: segment.slice(1) };
				node = node.paramChild.node;
			} else {
				let child = node.children.get(segment);
				if (!child) {
					child = new TrieNode<E>(segment);
					node.children.set(segment, child);
				}
				node = child;
			}
		}

		node.entry = entry;
	}
}

/**
 * Walks a trie. Static children win over parameters, parameters over wildcards,
 * falling back to the next kind when a branch leads nowhere.
 */
function matchTrie<E>(root: TrieNode<E>, segments: string[]): { entry: E; params: Readonly<Record<string, string>> } | null {
	const params: Record<string, string> = {};
	const entry = matchNode(root, segments, 0, params);
	if (entry === undefined) return null;
	return { entry, params: Object.keys(params).length > 0 ? params : EMPTY_PARAMS };
}

function matchNode<E>(node: TrieNode<E>, segments: string[], index: number, params: Record<string, string>): E | undefined {
	if (index === segments.length) {
		if (node.entry !== undefined) return node.entry;
		// "/files/*" also matches "/files"
		if (node.wildcardChild?.entry !== undefined) {
			params["*"] = "";
			return node.wildcardChild.entry;
		}
		return undefined;
	}

	const segment = segments[index];

	const staticChild = node.children.get(segment);
	if (staticChild) {
		const entry = matchNode(staticChild, segments, index + 1, params);
		if (entry !== undefined) return entry;
	}

	if (node.paramChild) {
		const entry = matchNode(node.paramChild.node, segments, index + 1, params);
		if (entry !== undefined) {
			params[node.paramChild.name] = safeDecode(segment);
			return entry;
		}
	}

	if (node.wildcardChild?.entry !== undefined) {
		params["*"] = segments.slice(index).map(safeDecode).join("/");
		return node.wildcardChild.entry;
	}

	return undefined;
}

/**
 * Splits a path into its non-empty segments.
 *
 * @example
 * ```typescript
 * splitPath("/users/42/"); // ["users", "42"]
 * ```
 */
export function splitPath(path: string): string[] {
	return path.split("/").filter(Boolean);
}

/**
 * Joins path pieces with single slashes.
 *
 * @example
 * ```typescript
 * joinPaths("/api/", "/v1", "users/"); // "/api/v1/users"
 * joinPaths("", "/"); // "/"
 * ```
 */
export function joinPaths(...paths: string[]): string {
	const segments = paths.flatMap(splitPath);
	return "/" + segments.join("/");
}

/**
 * Extracts the pathname of a request URL.
 */
export function pathnameOf(url: string): string {
	const queryStart = url.search(/[?#]/);
	const withoutQuery = queryStart === -1 ? url : url.slice(0, queryStart);

	const protocolEnd = withoutQuery.indexOf("://");
	if (protocolEnd === -1) return withoutQuery || "/";

	const pathStart = withoutQuery.indexOf("/", protocolEnd + 3);
	return pathStart === -1 ? "/" : withoutQuery.slice(pathStart);
}

function safeDecode(segment: string): string {
	try {
		return decodeURIComponent(segment);
	} catch {
		return segment;
	}
}
