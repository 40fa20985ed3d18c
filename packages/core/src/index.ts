import cluster from "node:cluster";
import { createServer } from "node:http";
import type { IncomingHttpHeaders, IncomingMessage, ServerResponse } from "node:http";
import { Levels } from "@rabbit-company/logger";
import { currentListenerId, ListenerGroup } from "./cluster";
import { HttpError, InstanceCreationError, PayloadTooLargeError } from "./errors";
import { clonedInstances, freshInstances } from "./factory";
import { invokeHandler } from "./handler";
import { createWebLogger, errorMetadata, logAccess } from "./logger";
import { defaultConcurrency, WorkerPool } from "./pool";
import { HttpRequest } from "./request";
import { ResponseWriter } from "./response";
import { isMethod, Router } from "./router";
import { NodeResponseSink, nodeFileReader, WebResponseSink } from "./sink";
import type { ResponseSink } from "./sink";
import type {
	ErrorHandler,
	FileReader,
	HandlerDescriptor,
	InstanceFactory,
	ListenOptions,
	MiddlewareHook,
	RequestState,
	Server,
	StaticCallback,
	TemplateEngine,
	WebLogger,
	WebOptions,
} from "./types";

/** Default maximum request body: 1 MiB */
const DEFAULT_MAX_BODY_SIZE = 1024 * 1024;

/**
 * What the transport knows about a request before its body is read.
 * @internal
 */
interface RequestHead {
	method: string;
	url: URL;
	headers: Headers;
	clientIp?: string;
}

/**
 * Web framework binding routes to a per-request application instance.
 *
 * Routes are registered on an application type `A`. Each matched request gets its own
 * instance (constructed fresh or cloned from a seed), passes through the middleware
 * hook and reaches the route callback together with the request and a response writer.
 * Handlers run on a bounded worker pool; the listener group accepts connections.
 *
 * Features:
 * - Route patterns with named parameters and trailing wildcards
 * - Static file mounts that run without an application instance
 * - One middleware hook per application with a typed request state bag
 * - Buffered and streamed responses, templates, cookies and redirects
 * - Multi-process listening through node:cluster
 *
 * @template A - The application type route callbacks are bound to
 * @template S - The request state type the middleware hook may fill
 *
 * @example
 * ```typescript
 * class MyApp {
 *   constructor(readonly counter = new Counter()) {}
 *
 *   before(req: HttpRequest) {
 *     this.counter.increment();
 *   }
 * }
 *
 * const app = new Web<MyApp>();
 *
 * app.registerMiddleware((app, req) => app.before(req));
 * app.get('/', (app, req, res) => res.send(`Visits: ${app.counter.value}`));
 * app.get('/hello/:first_name/:last_name', (app, req, res) =>
 *   res.render('hello', { first_name: req.param('first_name'), last_name: req.param('last_name') })
 * );
 * app.registerStaticMount('/static', serveFiles('web'));
 *
 * await app.startWith(new MyApp(), { port: 3000 });
 * ```
 */
export class Web<A = unknown, S extends RequestState = RequestState> extends Router<A, S> {
	private readonly logger: WebLogger;
	private readonly accessLog: boolean;
	private readonly maxBodySize: number;
	private readonly fileReader: FileReader;
	private readonly pool: WorkerPool;
	private engine?: TemplateEngine;
	private factory?: InstanceFactory<A>;

	/** Error handler function for handling uncaught errors */
	private errorHandler?: ErrorHandler<S>;

	/** 404 Not Found handler function */
	private notFoundHandler?: StaticCallback<S>;

	constructor(options: WebOptions = {}) {
		super(options.precedence);
		this.logger = options.logger ?? createWebLogger();
		this.accessLog = options.accessLog ?? true;
		this.maxBodySize = options.maxBodySize ?? DEFAULT_MAX_BODY_SIZE;
		this.fileReader = options.fileReader ?? nodeFileReader;
		this.engine = options.views;
		this.pool = new WorkerPool(options.workers ?? defaultConcurrency());
	}

	/** The pool executing route callbacks */
	get workerPool(): WorkerPool {
		return this.pool;
	}

	/**
	 * Sets the template engine used by `res.render`.
	 *
	 * @example
	 * ```typescript
	 * const views = createViewEngine({ directory: 'views' });
	 * views.registerAll();
	 * app.views(views);
	 * ```
	 */
	views(engine: TemplateEngine): this {
		this.engine = engine;
		return this;
	}

	/**
	 * Sets how application instances are produced. `start` and `startWith` call this;
	 * use it directly when serving through `handle` or `handleNode`.
	 *
	 * @example
	 * ```typescript
	 * app.useInstances(freshInstances(() => new MyApp()));
	 * const response = await app.handle(new Request('http://localhost/'));
	 * ```
	 */
	useInstances(factory: InstanceFactory<A>): this {
		this.factory = factory;
		return this;
	}

	/**
	 * Sets the hook run before each instance callback, replacing any earlier one.
	 */
	override registerMiddleware(hook: MiddlewareHook<A, S>): this {
		if (this.hasMiddleware) {
			this.logger.log(Levels.WARN, "Replacing the registered middleware hook");
		}
		return super.registerMiddleware(hook);
	}

	/**
	 * Sets a global error handler for the application.
	 * It is called for any error thrown by a route callback other than an `HttpError`,
	 * as long as the response has not started. A handler that writes nothing leaves the
	 * default 500 response.
	 *
	 * @example
	 * ```typescript
	 * app.onError((err, req, res) => {
	 *   return res.status(500).json({ error: err.message });
	 * });
	 * ```
	 */
	onError(handler: ErrorHandler<S>): this {
		this.errorHandler = handler;
		return this;
	}

	/**
	 * Sets a custom 404 Not Found handler for the application.
	 * This handler is called whenever a request doesn't match any registered route.
	 *
	 * @example
	 * ```typescript
	 * app.onNotFound((req, res) => {
	 *   return res.status(404).render('not-found', { path: req.pathname });
	 * });
	 * ```
	 */
	onNotFound(handler: StaticCallback<S>): this {
		this.notFoundHandler = handler;
		return this;
	}

	/**
	 * Serves a Web-standard request. The returned promise resolves as soon as the
	 * response is committed; a streamed body keeps arriving through `response.body`.
	 *
	 * @param clientIp - Client address, when the caller knows it
	 *
	 * @example
	 * ```typescript
	 * const response = await app.handle(new Request('http://localhost/hello/Jane/Doe'));
	 * console.log(response.status, await response.text());
	 * ```
	 */
	handle(request: Request, clientIp?: string): Promise<Response> {
		const sink = new WebResponseSink(request.method === "HEAD");
		const head: RequestHead = {
			method: request.method,
			url: new URL(request.url),
			headers: request.headers,
			clientIp,
		};

		void this.serve(head, () => readWebBody(request, this.maxBodySize), sink);
		return sink.response;
	}

	/**
	 * Request handler for Node.js.
	 *
	 * @example
	 * ```typescript
	 * import { createServer } from "node:http";
	 *
	 * app.useInstances(freshInstances(() => new MyApp()));
	 * createServer((req, res) => app.handleNode(req, res)).listen(3000);
	 * ```
	 */
	async handleNode(req: IncomingMessage, res: ServerResponse): Promise<void> {
		const sink = new NodeResponseSink(res, req.method === "HEAD");

		let url: URL;
		try {
			url = new URL(`http://${req.headers.host ?? "localhost"}${req.url ?? "/"}`);
		} catch {
			res.writeHead(400, { "content-type": "text/plain; charset=utf-8" });
			res.end("Bad Request");
			return;
		}

		const head: RequestHead = {
			method: req.method ?? "GET",
			url,
			headers: toWebHeaders(req.headers),
			clientIp: req.socket.remoteAddress,
		};

		await this.serve(head, () => readNodeBody(req, this.maxBodySize), sink);
	}

	/**
	 * Freezes the route table and starts accepting connections.
	 *
	 * With one listener (or inside a forked listener) this binds a node:http server in
	 * this process. With more, the primary process forks that many listeners through
	 * node:cluster and returns a server supervising them.
	 *
	 * @throws {Error} when the address cannot be bound
	 *
	 * @example
	 * ```typescript
	 * const server = await app.listen({ port: 3000, listeners: 1 });
	 * console.log(`Server running at http://localhost:${server.port}`);
	 *
	 * // Gracefully stop the server
	 * await server.stop();
	 * ```
	 */
	async listen(options: ListenOptions = {}): Promise<Server> {
		const { port = 3000, hostname = "localhost", listeners = 1, onListen } = options;

		this.freeze();

		if (cluster.isPrimary && listeners > 1) {
			const group = new ListenerGroup({ listeners, port, hostname, logger: this.logger });
			await group.start();
			return group;
		}

		const nodeServer = createServer((req, res) => {
			this.handleNode(req, res).catch((error: unknown) => {
				this.logger.log(Levels.ERROR, "Failed to handle request", errorMetadata(error));
				if (!res.headersSent) {
					res.writeHead(500, { "content-type": "text/plain; charset=utf-8" });
				}
				res.end("Internal Server Error");
			});
		});

		// Start listening
		await new Promise<void>((resolve, reject) => {
			const errorHandler = (error: Error): void => {
				reject(error);
			};

			nodeServer.on("error", errorHandler);

			nodeServer.listen(port, hostname, () => {
				nodeServer.off("error", errorHandler);
				resolve();
			});
		});

		const address = nodeServer.address();
		const boundPort = typeof address === "object" && address !== null ? address.port : port;
		const listener = currentListenerId();

		let resolveClosed: () => void = () => {};
		const closed = new Promise<void>((resolve) => {
			resolveClosed = resolve;
		});

		let stopping: Promise<void> | undefined;
		const stop = (): Promise<void> => {
			stopping ??= (async () => {
				try {
					await new Promise<void>((resolve, reject) => {
						nodeServer.close((error) => (error ? reject(error) : resolve()));
						nodeServer.closeIdleConnections();
					});
					await this.pool.shutdown();
					this.logger.log(Levels.INFO, `Listener ${listener} stopped`);
				} finally {
					resolveClosed();
				}
			})();
			return stopping;
		};

		const server: Server = { port: boundPort, hostname, role: "listener", closed, stop };

		this.logger.log(Levels.INFO, `Listener ${listener} listening on http://${hostname}:${boundPort}`);
		onListen?.({ port: boundPort, hostname, listener });

		if (cluster.isWorker) {
			process.on("message", (message: unknown) => {
				if (message !== "shutdown") return;
				void stop()
					.catch((error: unknown) => {
						this.logger.log(Levels.ERROR, `Listener ${listener} failed to stop`, errorMetadata(error));
					})
					.finally(() => cluster.worker?.disconnect());
			});
			process.send?.("ready");
		}

		return server;
	}

	/**
	 * Serves with a freshly constructed `Ctor` instance per request. Resolves only once
	 * the server has stopped.
	 *
	 * @example
	 * ```typescript
	 * await app.start(MyApp, { port: 8080 });
	 * ```
	 */
	start(Ctor: new () => A, options: ListenOptions = {}): Promise<void> {
		return this.useInstances(freshInstances(() => new Ctor())).run(options);
	}

	/**
	 * Serves with a copy of `seed` per request. Resolves only once the server has stopped.
	 *
	 * @example
	 * ```typescript
	 * await app.startWith(new MyApp(new Counter()), { port: 8080 });
	 * ```
	 */
	startWith(seed: A, options: ListenOptions = {}): Promise<void> {
		return this.useInstances(clonedInstances(seed)).run(options);
	}

	private async run(options: ListenOptions): Promise<void> {
		const server = await this.listen(options);

		if (server.role === "listener") {
			const onSignal = (): void => {
				void server.stop().catch((error: unknown) => {
					this.logger.log(Levels.ERROR, "Failed to stop server", errorMetadata(error));
				});
			};
			process.once("SIGINT", onSignal);
			process.once("SIGTERM", onSignal);
			await server.closed;
			process.off("SIGINT", onSignal);
			process.off("SIGTERM", onSignal);
			return;
		}

		await server.closed;
	}

	/**
	 * Runs one request end to end and writes its access line. Never rejects.
	 */
	private async serve(head: RequestHead, readBody: () => Promise<Uint8Array>, sink: ResponseSink): Promise<void> {
		const started = performance.now();
		const res = new ResponseWriter({ sink, views: this.engine, files: this.fileReader, logger: this.logger });

		try {
			await this.dispatch(head, readBody, res);
			await res.settled();
		} catch (error) {
			this.logger.log(Levels.ERROR, "Failed to serve request", errorMetadata(error));
			sink.abort(error);
		}

		if (this.accessLog) {
			logAccess(this.logger, {
				method: head.method,
				path: head.url.pathname,
				status: res.statusCode,
				duration: Math.round(performance.now() - started),
				clientIp: head.clientIp,
			});
		}
	}

	private async dispatch(head: RequestHead, readBody: () => Promise<Uint8Array>, res: ResponseWriter): Promise<void> {
		let req: HttpRequest<S> | undefined;

		try {
			const match = isMethod(head.method) ? this.match(head.method, head.url.pathname) : null;
			if (!match) {
				req = new HttpRequest<S>(head);
				await this.notFound(req, res);
				return;
			}

			// Only matched routes read the body
			const body = head.method === "GET" || head.method === "HEAD" ? undefined : await readBody();
			const request = new HttpRequest<S>({ ...head, body, params: match.params });
			req = request;

			await this.pool.submit(() => this.runHandler(match.handler, request, res));
		} catch (error) {
			await this.handleError(error, req, res);
		}
	}

	private async runHandler(handler: HandlerDescriptor<A, S>, req: HttpRequest<S>, res: ResponseWriter): Promise<void> {
		try {
			await invokeHandler(handler, this.factory, this.getMiddleware(), req, res);
		} catch (error) {
			await this.handleError(error, req, res);
		}
		await this.finalize(res);
	}

	private async notFound(req: HttpRequest<S>, res: ResponseWriter): Promise<void> {
		if (!this.notFoundHandler) {
			await res.sendError(404, "Not Found");
			return;
		}

		req.seal();
		try {
			await this.notFoundHandler(req, res);
		} catch (error) {
			await this.handleError(error, req, res);
		}
		await this.finalize(res);
	}

	/**
	 * Completes a response the handler left open, unless it deferred completion.
	 */
	private async finalize(res: ResponseWriter): Promise<void> {
		if (res.isDeferred) return;

		if (res.state === "building") {
			await res.sendError(500, "No response returned by handler");
		} else if (res.state === "streaming") {
			await res.closeStream();
		}
	}

	/**
	 * Maps a failure to a response: `HttpError` keeps its status and message, anything
	 * else goes to the `onError` handler or becomes a 500. Once the response has started
	 * the error is only logged and an open stream is closed.
	 */
	private async handleError(error: unknown, req: HttpRequest<S> | undefined, res: ResponseWriter): Promise<void> {
		if (res.state !== "building") {
			this.logger.log(Levels.ERROR, "Handler failed after the response started", errorMetadata(error));
			await res.closeStream();
			return;
		}

		if (error instanceof HttpError) {
			await res.sendError(error.status, error.message);
			return;
		}

		const message = error instanceof InstanceCreationError ? "Failed to create application instance" : "Handler failed";
		this.logger.log(Levels.ERROR, message, errorMetadata(error));

		if (this.errorHandler && req) {
			try {
				await this.errorHandler(error instanceof Error ? error : new Error(String(error)), req, res);
			} catch (handlerError) {
				this.logger.log(Levels.ERROR, "Error handler failed", errorMetadata(handlerError));
			}
			if (res.state === "streaming") await res.closeStream();
		}

		if (res.state === "building") {
			await res.sendError(500, "Internal Server Error");
		}
	}
}

/**
 * Converts Node.js request headers to Web headers.
 */
function toWebHeaders(incoming: IncomingHttpHeaders): Headers {
	const headers = new Headers();
	for (const [key, value] of Object.entries(incoming)) {
		if (value === undefined) continue;
		if (Array.isArray(value)) {
			for (const item of value) headers.append(key, item);
		} else {
			headers.set(key, value);
		}
	}
	return headers;
}

/**
 * Collects a Node.js request body.
 *
 * @throws {PayloadTooLargeError} once more than `limit` bytes arrive
 */
function readNodeBody(req: IncomingMessage, limit: number): Promise<Uint8Array> {
	return new Promise((resolve, reject) => {
		if (Number(req.headers["content-length"]) > limit) {
			req.resume();
			reject(new PayloadTooLargeError(limit));
			return;
		}

		const chunks: Buffer[] = [];
		let size = 0;

		const onData = (chunk: Buffer): void => {
			size += chunk.length;
			if (size > limit) {
				req.off("data", onData);
				req.resume();
				reject(new PayloadTooLargeError(limit));
				return;
			}
			chunks.push(chunk);
		};

		req.on("data", onData);
		req.on("end", () => resolve(Buffer.concat(chunks)));
		req.on("error", reject);
	});
}

/**
 * Collects a Web request body.
 *
 * @throws {PayloadTooLargeError} once more than `limit` bytes arrive
 */
async function readWebBody(request: Request, limit: number): Promise<Uint8Array> {
	if (!request.body) return new Uint8Array(0);
	if (Number(request.headers.get("content-length")) > limit) throw new PayloadTooLargeError(limit);

	const reader = request.body.getReader();
	const chunks: Uint8Array[] = [];
	let size = 0;

	while (true) {
		const { done, value } = await reader.read();
		if (done) break;

		size += value.length;
		if (size > limit) {
			await reader.cancel();
			throw new PayloadTooLargeError(limit);
		}
		chunks.push(value);
	}

	const body = new Uint8Array(size);
	let offset = 0;
	for (const chunk of chunks) {
		body.set(chunk, offset);
		offset += chunk.length;
	}
	return body;
}

export * from "./cluster";
export * from "./errors";
export * from "./factory";
export * from "./handler";
export * from "./logger";
export * from "./mime";
export * from "./pool";
export * from "./request";
export * from "./response";
export * from "./router";
export * from "./sink";
export type * from "./types";
