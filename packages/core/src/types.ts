import type { Logger } from "@rabbit-company/logger";
import type { HttpRequest } from "./request";
import type { ResponseWriter } from "./response";

/**
 * HTTP methods a route can be registered for.
 *
 * @example
 * ```typescript
 * const method: Method = 'GET';
 * router.register(method, '/users/:id', instanceHandler(showUser));
 * ```
 */
export type Method = "GET" | "POST" | "PUT" | "DELETE" | "HEAD" | "PATCH" | "OPTIONS";

/**
 * State a middleware hook may attach to a request before the route callback runs.
 */
export type RequestState = Record<string, unknown>;

/**
 * Route callback bound to the application type `A`. It receives the per-request
 * application instance, the request and the response writer. Completion is signalled
 * through the writer, not through the return value.
 *
 * @template A - The application type
 * @template S - The request state type
 *
 * @example
 * ```typescript
 * class Hello {
 *   greeting = "Hello";
 * }
 *
 * const hello: InstanceCallback<Hello> = (app, req, res) =>
 *   res.send(`${app.greeting}, ${req.param("name")}!`);
 * ```
 */
export type InstanceCallback<A, S extends RequestState = RequestState> = (app: A, req: HttpRequest<S>, res: ResponseWriter) => void | Promise<void>;

/**
 * Route callback with no application instance, used for file-serving mounts.
 */
export type StaticCallback<S extends RequestState = RequestState> = (req: HttpRequest<S>, res: ResponseWriter) => void | Promise<void>;

/**
 * A registered handler: either bound to the application type or free-standing.
 */
export type HandlerDescriptor<A, S extends RequestState = RequestState> =
	| { readonly kind: "instance"; readonly callback: InstanceCallback<A, S> }
	| { readonly kind: "static"; readonly callback: StaticCallback<S> };

/**
 * The single hook run on the fresh application instance before the route callback.
 * It may rewrite request state but cannot respond.
 *
 * @example
 * ```typescript
 * const auth: MiddlewareHook<App, { user: string }> = (app, req) => {
 *   req.set("user", req.cookie("name") ?? "anonymous");
 * };
 * ```
 */
export type MiddlewareHook<A, S extends RequestState = RequestState> = (app: A, req: HttpRequest<S>) => void | Promise<void>;

/**
 * One segment of a parsed route pattern.
 */
export type Segment = { readonly kind: "literal"; readonly value: string } | { readonly kind: "param"; readonly name: string } | { readonly kind: "wildcard" };

/**
 * A registered route. Immutable once stored in the route table.
 */
export interface Route<A, S extends RequestState = RequestState> {
	/** Unique identifier assigned at registration */
	readonly id: string;
	readonly method: Method;
	/** The pattern as registered, normalized (e.g. "/hello/:name") */
	readonly path: string;
	readonly segments: readonly Segment[];
	readonly handler: HandlerDescriptor<A, S>;
}

/**
 * Outcome of a successful route lookup. A miss is reported as `null`.
 *
 * @example
 * ```typescript
 * const result = router.match('GET', '/hello/Jane/Doe');
 * // result.params -> { first_name: 'Jane', last_name: 'Doe' }
 * ```
 */
export interface MatchResult<A, S extends RequestState = RequestState> {
	readonly route: Route<A, S>;
	readonly handler: HandlerDescriptor<A, S>;
	/** Parameter values in pattern order; a wildcard binds the key "*" */
	readonly params: Readonly<Record<string, string>>;
	/** The matched request path */
	readonly path: string;
}

/**
 * How overlapping routes are ordered during lookup.
 * - "registration": the first registered matching route wins
 * - "specificity": literal segments beat parameters, parameters beat wildcards;
 *   registration order breaks remaining ties
 */
export type RoutePrecedence = "registration" | "specificity";

/**
 * An application type that knows how to copy itself for each request.
 */
export interface Cloneable<A> {
	clone(): A;
}

/**
 * Produces one application instance per request.
 */
export interface InstanceFactory<A> {
	readonly mode: "fresh" | "cloned";
	create(): A;
}

/**
 * Template engine collaborator. Fails with a `RenderError`.
 */
export interface TemplateEngine {
	render(name: string, data: Record<string, unknown>): string;
}

/**
 * File-read collaborator used by `ResponseWriter.sendFile`. Fails with a
 * `FileNotFoundError` when nothing exists at `path`, or any other error for I/O failures.
 */
export interface FileReader {
	readFile(path: string): Promise<Uint8Array>;
}

/**
 * The part of `@rabbit-company/logger`'s `Logger` the framework writes to.
 */
export type WebLogger = Pick<Logger, "log">;

/**
 * Handler for errors thrown by route callbacks. Runs only while the response can still be built.
 */
export type ErrorHandler<S extends RequestState = RequestState> = (err: Error, req: HttpRequest<S>, res: ResponseWriter) => void | Promise<void>;

/**
 * Options for a `Web` application.
 *
 * @example
 * ```typescript
 * const app = new Web<MyApp>({
 *   workers: 8,
 *   maxBodySize: 64 * 1024,
 *   logger: createWebLogger({ level: Levels.DEBUG }),
 * });
 * ```
 */
export interface WebOptions {
	/** Logger receiving lifecycle, access and error lines (default: console logger at INFO) */
	logger?: WebLogger;
	/** Whether to log one line per request at the HTTP level (default: true) */
	accessLog?: boolean;
	/** Number of worker-pool slots executing handlers (default: half the available parallelism, at least 1) */
	workers?: number;
	/** Maximum accepted request body in bytes (default: 1 MiB) */
	maxBodySize?: number;
	/** Tie-break policy for overlapping routes (default: "registration") */
	precedence?: RoutePrecedence;
	/** File-read collaborator for `sendFile` (default: node:fs) */
	fileReader?: FileReader;
	/** Template engine for `render` */
	views?: TemplateEngine;
}

/**
 * Configuration options for starting the server.
 *
 * @example
 * ```typescript
 * await app.listen({
 *   port: 8080,
 *   hostname: '0.0.0.0',
 *   listeners: 4,
 *   onListen: ({ port, hostname, listener }) => {
 *     console.log(`listener ${listener} on http://${hostname}:${port}`);
 *   }
 * });
 * ```
 */
export interface ListenOptions {
	/** Port number to listen on (default: 3000) */
	port?: number;
	/** Hostname to bind to (default: "localhost") */
	hostname?: string;
	/**
	 * Number of listener processes sharing the socket (default: 1).
	 * With more than one, the primary process forks listeners through node:cluster. Each
	 * listener then builds its own application seed, so handles such as counters are
	 * per process, not shared across listeners.
	 */
	listeners?: number;
	/** Called once a listener is bound */
	onListen?: (info: { port: number; hostname: string; listener: number }) => void;
}

/**
 * A running server.
 */
export interface Server {
	readonly port: number;
	readonly hostname: string;
	/** "primary" when this process only supervises forked listeners */
	readonly role: "listener" | "primary";
	/** Settles once the server has stopped */
	readonly closed: Promise<void>;
	/** Stops accepting connections and waits for in-flight handlers */
	stop(): Promise<void>;
}
