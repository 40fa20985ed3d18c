import { RouterFrozenError } from "./errors";
import { instanceHandler, noopMiddleware, staticHandler } from "./handler";
import type { HandlerDescriptor, InstanceCallback, MatchResult, Method, MiddlewareHook, RequestState, Route, RoutePrecedence, Segment, StaticCallback } from "./types";

/** Methods a route can be registered for */
export const METHODS: readonly Method[] = ["GET", "POST", "PUT", "DELETE", "HEAD", "PATCH", "OPTIONS"];

/** Key under which a wildcard binds the remainder of the path */
export const WILDCARD_PARAM = "*";

/** Frozen empty object used as default params to avoid object allocation */
const EMPTY_PARAMS: Readonly<Record<string, string>> = Object.freeze({});

type Matcher = (urlSegments: readonly string[]) => Record<string, string> | null;

interface CompiledRoute<A, S extends RequestState> {
	route: Route<A, S>;
	match: Matcher;
	/** Segment ranks used by the "specificity" policy */
	ranks: number[];
	order: number;
}

/**
 * Type guard for strings naming a registrable method.
 */
export function isMethod(value: string): value is Method {
	return (METHODS as readonly string[]).includes(value);
}

/**
 * Route table mapping (method, pattern) pairs to handler descriptors.
 *
 * Patterns are split on "/"; a segment starting with ":" is a named parameter and a
 * final "*" matches the rest of the path. Lookup scans the routes registered for the
 * request method in precedence order and returns the first match.
 *
 * Registration must finish before serving starts: `freeze()` is called by the server
 * and any later registration throws a `RouterFrozenError`.
 *
 * @template A - The application type route callbacks are bound to
 * @template S - The request state type the middleware hook may fill
 *
 * @example
 * ```typescript
 * const router = new Router<MyApp>();
 * router.get('/', (app, req, res) => app.home(req, res));
 * router.get('/hello/:first_name/:last_name', (app, req, res) => app.hello(req, res));
 * router.registerStaticMount('/static', serveFiles('web'));
 * router.registerMiddleware((app, req) => app.before(req));
 * ```
 */
export class Router<A = unknown, S extends RequestState = RequestState> {
	/** All registered routes, in registration order */
	private routes: Route<A, S>[] = [];
	/** Compiled routes per method, in lookup order */
	private table = new Map<Method, CompiledRoute<A, S>[]>();
	/** Cache for frequently matched paths */
	private matchCache = new Map<string, CompiledRoute<A, S> | null>();
	private middleware: MiddlewareHook<A, S> = noopMiddleware;
	private middlewareRegistered = false;
	private frozen = false;
	private idCounter = 0;

	constructor(private readonly precedence: RoutePrecedence = "registration") {}

	/**
	 * Registers a handler descriptor for a method and pattern.
	 *
	 * Registering a pattern that is already present keeps both routes; under the
	 * "registration" policy the first one keeps serving every request.
	 *
	 * @param method - HTTP method
	 * @param path - Pattern such as "/users/:id" or "/assets/*"
	 * @param handler - Descriptor built with `instanceHandler` or `staticHandler`
	 * @returns The route ID
	 * @throws {RouterFrozenError} once the server has started
	 * @throws {TypeError} for an empty parameter name or a wildcard that is not last
	 */
	register(method: Method, path: string, handler: HandlerDescriptor<A, S>): string {
		if (this.frozen) throw new RouterFrozenError();

		const segments = parsePattern(path);
		const route: Route<A, S> = {
			id: this.generateId(),
			method,
			path: formatPattern(segments),
			segments,
			handler,
		};

		this.routes.push(route);

		const compiled = this.table.get(method) ?? [];
		compiled.push({
			route,
			match: createPathMatcherSegments(segments),
			ranks: segments.map(rankSegment),
			order: this.routes.length,
		});
		if (this.precedence === "specificity") compiled.sort(compareSpecificity);
		this.table.set(method, compiled);

		this.matchCache.clear();
		return route.id;
	}

	/**
	 * Registers a GET route for a callback bound to the application type.
	 *
	 * @example
	 * ```typescript
	 * router.get('/users/:id', async (app, req, res) => {
	 *   const user = await app.users.find(req.param('id'));
	 *   await res.json(user);
	 * });
	 * ```
	 */
	get(path: string, callback: InstanceCallback<A, S>): this {
		this.register("GET", path, instanceHandler(callback));
		return this;
	}

	post(path: string, callback: InstanceCallback<A, S>): this {
		this.register("POST", path, instanceHandler(callback));
		return this;
	}

	put(path: string, callback: InstanceCallback<A, S>): this {
		this.register("PUT", path, instanceHandler(callback));
		return this;
	}

	delete(path: string, callback: InstanceCallback<A, S>): this {
		this.register("DELETE", path, instanceHandler(callback));
		return this;
	}

	/**
	 * Registers a HEAD route. The server drops any body the callback writes.
	 */
	head(path: string, callback: InstanceCallback<A, S>): this {
		this.register("HEAD", path, instanceHandler(callback));
		return this;
	}

	patch(path: string, callback: InstanceCallback<A, S>): this {
		this.register("PATCH", path, instanceHandler(callback));
		return this;
	}

	options(path: string, callback: InstanceCallback<A, S>): this {
		this.register("OPTIONS", path, instanceHandler(callback));
		return this;
	}

	/**
	 * Mounts a static callback under a path prefix for GET requests.
	 * The callback sees the rest of the path in `req.params["*"]`.
	 *
	 * @example
	 * ```typescript
	 * router.registerStaticMount('/static', (req, res) => res.sendFile(`web/${req.params['*']}`));
	 * // GET /static/css/site.css -> params["*"] === "css/site.css"
	 * ```
	 */
	registerStaticMount(prefix: string, callback: StaticCallback<S>): this {
		this.register("GET", joinPaths(prefix, WILDCARD_PARAM), staticHandler(callback));
		return this;
	}

	/** Alias of `registerStaticMount`. */
	getStatic(prefix: string, callback: StaticCallback<S>): this {
		return this.registerStaticMount(prefix, callback);
	}

	/**
	 * Sets the hook run on each fresh application instance before its route callback.
	 * Only one hook exists; registering another replaces it.
	 */
	registerMiddleware(hook: MiddlewareHook<A, S>): this {
		if (this.frozen) throw new RouterFrozenError();
		this.middleware = hook;
		this.middlewareRegistered = true;
		return this;
	}

	/** Alias of `registerMiddleware`. */
	addMiddleware(hook: MiddlewareHook<A, S>): this {
		return this.registerMiddleware(hook);
	}

	/** Whether a middleware hook has been registered. */
	get hasMiddleware(): boolean {
		return this.middlewareRegistered;
	}

	/** The registered middleware hook, or a no-op. */
	getMiddleware(): MiddlewareHook<A, S> {
		return this.middleware;
	}

	/**
	 * Copies every route of `router` under `prefix`. The sub-router's middleware hook is
	 * adopted only when this router has none.
	 *
	 * @example
	 * ```typescript
	 * const admin = new Router<MyApp>();
	 * admin.get('/dashboard', dashboard);
	 *
	 * app.mount('/admin', admin);
	 * // Dashboard will be available at /admin/dashboard
	 * ```
	 */
	mount(prefix: string, router: Router<A, S>): this {
		for (const route of router.routes) {
			this.register(route.method, joinPaths(prefix, route.path), route.handler);
		}
		if (!this.middlewareRegistered && router.middlewareRegistered) {
			this.registerMiddleware(router.middleware);
		}
		return this;
	}

	/**
	 * Finds the route serving `method` and `path` and extracts its parameters.
	 *
	 * @returns The match, or `null` when no route applies
	 *
	 * @example
	 * ```typescript
	 * const match = router.match('GET', '/hello/Jane/Doe');
	 * if (match) {
	 *   console.log(match.params.first_name); // "Jane"
	 * }
	 * ```
	 */
	match(method: Method, path: string): MatchResult<A, S> | null {
		const urlSegments = decodePathSegments(path);
		const cacheKey = `${method}:${path}`;

		const cached = this.matchCache.get(cacheKey);
		if (cached === null) return null;
		if (cached) {
			const params = cached.match(urlSegments);
			if (params) return { route: cached.route, handler: cached.route.handler, params, path };
		}

		const candidates = this.table.get(method) ?? [];
		for (const candidate of candidates) {
			const params = candidate.match(urlSegments);
			if (params) {
				this.remember(cacheKey, candidate);
				return { route: candidate.route, handler: candidate.route.handler, params, path };
			}
		}

		this.remember(cacheKey, null);
		return null;
	}

	/**
	 * Gets all registered routes with their IDs and metadata.
	 *
	 * @example
	 * ```typescript
	 * for (const route of app.getRoutes()) {
	 *   console.log(`${route.id}: ${route.method} ${route.path} (${route.kind})`);
	 * }
	 * ```
	 */
	getRoutes(): Array<{ id: string; method: Method; path: string; kind: HandlerDescriptor<A, S>["kind"] }> {
		return this.routes.map((route) => ({
			id: route.id,
			method: route.method,
			path: route.path,
			kind: route.handler.kind,
		}));
	}

	/** Rejects any further registration. */
	freeze(): void {
		this.frozen = true;
	}

	get isFrozen(): boolean {
		return this.frozen;
	}

	private remember(key: string, value: CompiledRoute<A, S> | null): void {
		// Cache with size limit
		if (this.matchCache.size < 500) {
			this.matchCache.set(key, value);
		}
	}

	private generateId(): string {
		return `route-${++this.idCounter}`;
	}
}

/**
 * Splits a path into segments, dropping empty ones.
 *
 * @example
 * ```typescript
 * getPathSegments("/hello/Jane/Doe"); // ["hello", "Jane", "Doe"]
 * getPathSegments("/"); // []
 * ```
 */
export function getPathSegments(path: string): string[] {
	return path.split("/").filter(Boolean);
}

/**
 * Splits a URL pathname into percent-decoded segments. A segment that is not valid
 * percent-encoding is kept as it is.
 *
 * @example
 * ```typescript
 * decodePathSegments("/caf%C3%A9/my%20file.css"); // ["café", "my file.css"]
 * ```
 */
export function decodePathSegments(path: string): string[] {
	return getPathSegments(path).map(safeDecode);
}

/**
 * Parses a route pattern into literal, parameter and wildcard segments.
 */
export function parsePattern(path: string): Segment[] {
	const parts = getPathSegments(path);

	return parts.map((part, index): Segment => {
		if (part === WILDCARD_PARAM) {
			if (index !== parts.length - 1) {
				throw new TypeError(`Wildcard must be the last segment of "${path}"`);
			}
			return { kind: "wildcard" };
		}
		if (part.startsWith(":")) {
			const name = part.slice(1);
			if (!name) throw new TypeError(`Empty parameter name in "${path}"`);
			return { kind: "param", name };
		}
		return { kind: "literal", value: part };
	});
}

function formatPattern(segments: readonly Segment[]): string {
	const parts = segments.map((segment) => {
		switch (segment.kind) {
			case "literal":
				return segment.value;
			case "param":
				return `:${segment.name}`;
			case "wildcard":
				return WILDCARD_PARAM;
		}
	});
	return "/" + parts.join("/");
}

/**
 * Creates a path matching function that checks if decoded URL segments match a route
 * pattern. Parameters bind one non-empty segment each; a trailing wildcard binds the
 * remaining segments joined with "/".
 *
 * @example
 * ```typescript
 * const matcher = createPathMatcherSegments(parsePattern("/users/:id"));
 * matcher(["users", "123"]); // { id: "123" }
 * matcher(["users"]); // null
 * ```
 */
export function createPathMatcherSegments(segments: readonly Segment[]): Matcher {
	const segmentCount = segments.length;
	const hasWildcard = segments[segmentCount - 1]?.kind === "wildcard";
	const hasParams = segments.some((segment) => segment.kind === "param");

	return (urlSegments) => {
		// Quick length check for non-wildcard routes
		if (!hasWildcard && urlSegments.length !== segmentCount) return null;

		// Wildcard routes need every segment before the wildcard
		if (hasWildcard && urlSegments.length < segmentCount - 1) return null;

		// Fast path for routes without parameters
		if (!hasParams && !hasWildcard) {
			for (let i = 0; i < segmentCount; i++) {
				const segment = segments[i];
				if (segment?.kind !== "literal" || segment.value !== urlSegments[i]) return null;
			}
			return EMPTY_PARAMS;
		}

		const params: Record<string, string> = {};

		for (let i = 0; i < segmentCount; i++) {
			const segment = segments[i];
			const part = urlSegments[i];
			if (!segment) return null;

			if (segment.kind === "wildcard") {
				params[WILDCARD_PARAM] = urlSegments.slice(i).join("/");
				return params;
			}

			if (!part) return null;

			if (segment.kind === "param") {
				params[segment.name] = part;
			} else if (segment.value !== part) {
				return null;
			}
		}

		return params;
	};
}

/**
 * Joins multiple path segments into a single path, ensuring proper slashes between them.
 *
 * @example
 * ```typescript
 * joinPaths("/api/", "/v1", "users/"); // "/api/v1/users"
 * joinPaths("", "users", ":id"); // "/users/:id"
 * ```
 */
export function joinPaths(...paths: string[]): string {
	let result = "/";
	for (const p of paths) {
		if (p && p !== "/") {
			// Trim slashes efficiently
			let start = 0;
			let end = p.length;
			if (p[0] === "/") start++;
			if (p[end - 1] === "/") end--;

			if (end > start) {
				if (result !== "/") result += "/";
				result += p.slice(start, end);
			}
		}
	}
	return result;
}

function safeDecode(value: string): string {
	try {
		return decodeURIComponent(value);
	} catch {
		return value;
	}
}

function rankSegment(segment: Segment): number {
	switch (segment.kind) {
		case "literal":
			return 0;
		case "param":
			return 1;
		case "wildcard":
			return 2;
	}
}

function compareSpecificity<A, S extends RequestState>(a: CompiledRoute<A, S>, b: CompiledRoute<A, S>): number {
	const length = Math.min(a.ranks.length, b.ranks.length);
	for (let i = 0; i < length; i++) {
		const diff = (a.ranks[i] ?? 0) - (b.ranks[i] ?? 0);
		if (diff !== 0) return diff;
	}
	return a.order - b.order;
}
