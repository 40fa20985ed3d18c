import { Levels } from "@rabbit-company/logger";
import { serialize } from "cookie";
import type { SerializeOptions } from "cookie";
import { FileNotFoundError, HttpError, RenderError, ResponseStateError } from "./errors";
import { errorMetadata } from "./logger";
import { getMimeType } from "./mime";
import { isNullBodyStatus, nodeFileReader } from "./sink";
import type { ResponseSink } from "./sink";
import type { FileReader, TemplateEngine, WebLogger } from "./types";

/** Options accepted by `ResponseWriter.cookie`, passed to `cookie.serialize` */
export type CookieOptions = SerializeOptions;

/**
 * Lifecycle of a response:
 * - "building": status and headers may still change
 * - "streaming": headers are sent, body chunks are being appended
 * - "committed": the response is complete (or fully handed to the sink)
 */
export type ResponseState = "building" | "streaming" | "committed";

export interface ResponseWriterInit {
	sink: ResponseSink;
	views?: TemplateEngine;
	files?: FileReader;
	logger?: WebLogger;
}

const encoder = new TextEncoder();

function toBytes(body: string | Uint8Array): Uint8Array {
	return typeof body === "string" ? encoder.encode(body) : body;
}

/**
 * Writes exactly one response for a request, either buffered in one go or
 * streamed in chunks while the connection stays open.
 *
 * Status, headers and cookies can be set while the writer is building. The first
 * of `send`, `json`, `redirect`, `render`, `sendFile`, `handle` or `stream` commits
 * the response; any later write throws a `ResponseStateError`.
 *
 * @example
 * ```typescript
 * router.get('/settings/:name', (app, req, res) => {
 *   return res
 *     .status(200)
 *     .cookie('name', req.param('name') ?? '', { path: '/' })
 *     .send('Cookie set');
 * });
 * ```
 */
export class ResponseWriter {
	private code = 200;
	private headerList: Array<[string, string]> = [];
	private current: ResponseState = "building";
	private deferred = false;
	private pending: Promise<void> = Promise.resolve();
	private activeStream?: StreamingResponse;

	private readonly sink: ResponseSink;
	private readonly views?: TemplateEngine;
	private readonly files: FileReader;
	private readonly logger?: WebLogger;

	constructor(init: ResponseWriterInit) {
		this.sink = init.sink;
		this.views = init.views;
		this.files = init.files ?? nodeFileReader;
		this.logger = init.logger;
	}

	/** Current lifecycle state */
	get state(): ResponseState {
		return this.current;
	}

	get statusCode(): number {
		return this.code;
	}

	/** Whether the handler took over completion with `defer()` */
	get isDeferred(): boolean {
		return this.deferred;
	}

	/**
	 * Sets the status code.
	 *
	 * @throws {RangeError} for a code outside 200-599
	 * @throws {ResponseStateError} once the response is committed
	 */
	status(code: number): this {
		this.assertBuilding("status");
		if (!Number.isInteger(code) || code < 200 || code > 599) {
			throw new RangeError(`Invalid status code ${code}`);
		}
		this.code = code;
		return this;
	}

	/**
	 * Sets a header, replacing any earlier value. `Set-Cookie` headers accumulate instead.
	 */
	header(name: string, value: string): this {
		this.assertBuilding("header");
		this.setHeader(name, value);
		return this;
	}

	/** Value of a header set so far. */
	getHeader(name: string): string | undefined {
		const key = name.toLowerCase();
		return this.headerList.find(([header]) => header === key)?.[1];
	}

	contentType(type: string): this {
		return this.header("content-type", type);
	}

	/**
	 * Adds a `Set-Cookie` header.
	 *
	 * @example
	 * ```typescript
	 * res.cookie('session', token, { httpOnly: true, sameSite: 'lax', maxAge: 3600 });
	 * ```
	 */
	cookie(name: string, value: string, options?: CookieOptions): this {
		this.assertBuilding("cookie");
		this.headerList.push(["set-cookie", serialize(name, value, options)]);
		return this;
	}

	/**
	 * Commits a buffered response. Strings default to `text/plain; charset=utf-8`.
	 *
	 * The returned promise settles once the body is handed to the connection; write
	 * failures are logged rather than rejected, since the request can no longer be answered.
	 */
	send(body: string | Uint8Array = ""): Promise<void> {
		this.assertBuilding("send");
		if (typeof body === "string" && body.length > 0 && !this.getHeader("content-type")) {
			this.setHeader("content-type", "text/plain; charset=utf-8");
		}
		this.current = "committed";
		return this.track(this.commit(toBytes(body)));
	}

	/**
	 * Commits a JSON response.
	 *
	 * @example
	 * ```typescript
	 * return res.status(201).json({ id: user.id });
	 * ```
	 */
	json(data: unknown): Promise<void> {
		this.assertBuilding("json");
		if (!this.getHeader("content-type")) this.setHeader("content-type", "application/json; charset=utf-8");
		return this.send(JSON.stringify(data));
	}

	/**
	 * Commits a redirect with an empty body.
	 *
	 * @param status - Redirect status (default: 302)
	 */
	redirect(url: string, status = 302): Promise<void> {
		return this.status(status).header("location", url).send();
	}

	/**
	 * Renders a template with the configured engine and commits it as HTML.
	 * A missing engine or a failed render answers 500 and logs the cause.
	 *
	 * @example
	 * ```typescript
	 * return res.render('hello', { first_name: 'Jane', last_name: 'Doe' });
	 * ```
	 */
	render(name: string, data: Record<string, unknown> = {}): Promise<void> {
		this.assertBuilding("render");

		let html: string;
		try {
			if (!this.views) throw new RenderError("No template engine configured");
			html = this.views.render(name, data);
		} catch (error) {
			this.logger?.log(Levels.ERROR, `Failed to render template "${name}"`, errorMetadata(error));
			return this.sendError(500, "Internal Server Error");
		}

		if (!this.getHeader("content-type")) this.setHeader("content-type", "text/html; charset=utf-8");
		return this.send(html);
	}

	/**
	 * Reads a file and commits it with a content type derived from its extension.
	 * A missing file answers 404, any other read failure 500.
	 *
	 * The writer counts as committed from the moment this is called.
	 */
	sendFile(path: string): Promise<void> {
		this.assertBuilding("sendFile");
		this.current = "committed";
		return this.track(this.commitFile(path));
	}

	/**
	 * Runs `fn` and commits an empty response with the status it returns. An `HttpError`
	 * thrown by `fn` is answered with its status and message; other errors propagate.
	 *
	 * @example
	 * ```typescript
	 * router.post('/login', (app, req, res) =>
	 *   res.handle(() => {
	 *     const form = req.form();
	 *     if (!form.username) throw new HttpError(400, 'missing user name');
	 *     return 200;
	 *   })
	 * );
	 * ```
	 */
	async handle(fn: () => number | Promise<number>): Promise<void> {
		this.assertBuilding("handle");

		let status: number;
		try {
			status = await fn();
		} catch (error) {
			if (error instanceof HttpError) return this.sendError(error.status, error.message);
			throw error;
		}

		return this.status(status).send();
	}

	/**
	 * Sends status and headers now and returns a stream for the body.
	 *
	 * Unless `defer()` is called, the server closes the stream when the handler returns.
	 *
	 * @example
	 * ```typescript
	 * router.get('/stream', async (app, req, res) => {
	 *   const stream = res.stream();
	 *   for (const word of ['toto', 'tata', 'titi']) {
	 *     if (!(await stream.append(`${word}\n`))) break;
	 *     await sleep(1000);
	 *   }
	 *   await stream.close();
	 * });
	 * ```
	 */
	stream(): StreamingResponse {
		this.assertBuilding("stream");
		if (!this.getHeader("content-type")) this.setHeader("content-type", "text/plain; charset=utf-8");

		this.sink.start(this.code, this.headerList);
		this.current = "streaming";

		const stream = new StreamingResponse(
			this.sink,
			() => {
				this.current = "committed";
			},
			this.logger
		);
		this.activeStream = stream;
		return stream;
	}

	/**
	 * Hands completion of the response to a continuation that outlives the handler.
	 * The server then neither answers 500 for a still-building response nor closes an
	 * open stream when the handler returns.
	 *
	 * @example
	 * ```typescript
	 * router.get('/later', (app, req, res) => {
	 *   res.defer();
	 *   setTimeout(() => void res.send('done'), 100);
	 * });
	 * ```
	 */
	defer(): void {
		this.deferred = true;
	}

	/**
	 * Commits a plain-text error response.
	 * @internal
	 */
	sendError(status: number, message: string): Promise<void> {
		this.assertBuilding("sendError");
		this.code = status;
		this.setHeader("content-type", "text/plain; charset=utf-8");
		return this.send(message);
	}

	/**
	 * Closes the open stream, if any.
	 * @internal
	 */
	closeStream(): Promise<void> {
		return this.activeStream ? this.activeStream.close() : Promise.resolve();
	}

	/**
	 * Settles once every body handed over so far has reached the sink.
	 * @internal
	 */
	async settled(): Promise<void> {
		await this.pending;
		if (this.activeStream) await this.activeStream.whenClosed();
	}

	private assertBuilding(operation: string): void {
		if (this.current !== "building") {
			throw new ResponseStateError(`Cannot call ${operation}() on a response that is already ${this.current}`);
		}
	}

	private setHeader(name: string, value: string): void {
		const key = name.toLowerCase();
		if (key !== "set-cookie") {
			this.headerList = this.headerList.filter(([header]) => header !== key);
		}
		this.headerList.push([key, value]);
	}

	private async commit(bytes: Uint8Array): Promise<void> {
		if (!isNullBodyStatus(this.code)) this.setHeader("content-length", String(bytes.length));
		this.sink.start(this.code, this.headerList);
		await this.sink.end(bytes);
	}

	private async commitFile(path: string): Promise<void> {
		let contents: Uint8Array;
		try {
			contents = await this.files.readFile(path);
		} catch (error) {
			this.setHeader("content-type", "text/plain; charset=utf-8");
			if (error instanceof FileNotFoundError) {
				this.code = 404;
				return this.commit(toBytes("Not Found"));
			}
			this.logger?.log(Levels.ERROR, `Failed to read file "${path}"`, errorMetadata(error));
			this.code = 500;
			return this.commit(toBytes("Internal Server Error"));
		}

		this.setHeader("content-type", getMimeType(path));
		return this.commit(contents);
	}

	private track(task: Promise<void>): Promise<void> {
		const tracked = task.catch((error: unknown) => {
			this.logger?.log(Levels.WARN, "Failed to write response", errorMetadata(error));
			this.sink.abort(error);
		});
		this.pending = tracked;
		return tracked;
	}
}

/**
 * Body of a streamed response. Chunks are written in call order.
 */
export class StreamingResponse {
	private tail: Promise<boolean> = Promise.resolve(true);
	private closing?: Promise<void>;
	private failed = false;

	constructor(
		private readonly sink: ResponseSink,
		private readonly onClose: () => void,
		private readonly logger?: WebLogger
	) {}

	/** True once `close()` was called, a write failed or the peer went away */
	get closed(): boolean {
		return this.closing !== undefined || this.failed || this.sink.closed;
	}

	/**
	 * Writes a chunk to the connection.
	 *
	 * @returns `true` when the chunk was written, `false` when the stream is closed or broken
	 */
	append(chunk: string | Uint8Array): Promise<boolean> {
		if (this.closing) return Promise.resolve(false);

		const bytes = toBytes(chunk);
		const next = this.tail.then(() => this.write(bytes));
		this.tail = next;
		return next;
	}

	/**
	 * Finishes the body after every chunk appended so far. Calling it again is a no-op.
	 */
	close(): Promise<void> {
		if (!this.closing) {
			this.onClose();
			this.closing = this.tail
				.then(() => this.sink.end())
				.catch((error: unknown) => {
					this.logger?.log(Levels.WARN, "Failed to close response stream", errorMetadata(error));
				});
		}
		return this.closing;
	}

	/** @internal */
	whenClosed(): Promise<void> {
		return this.closing ?? Promise.resolve();
	}

	private async write(bytes: Uint8Array): Promise<boolean> {
		if (this.failed || this.sink.closed) return false;

		try {
			await this.sink.write(bytes);
			return true;
		} catch (error) {
			this.failed = true;
			this.logger?.log(Levels.WARN, "Stream write failed", errorMetadata(error));
			return false;
		}
	}
}
