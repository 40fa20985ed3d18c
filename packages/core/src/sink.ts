import { readFile } from "node:fs/promises";
import type { OutgoingHttpHeaders, ServerResponse } from "node:http";
import { FileNotFoundError } from "./errors";
import type { FileReader } from "./types";

export type HeaderList = ReadonlyArray<readonly [string, string]>;

/**
 * The connection side of a response: where the writer sends the status line,
 * headers and body bytes.
 */
export interface ResponseSink {
	/** Sends status and headers. Called exactly once. */
	start(status: number, headers: HeaderList): void;
	/** Writes one body chunk; rejects when the peer is gone. */
	write(chunk: Uint8Array): Promise<void>;
	/** Writes an optional last chunk and finishes the response. */
	end(chunk?: Uint8Array): Promise<void>;
	/** Tears the response down after a failure the client cannot be told about. */
	abort(error: unknown): void;
	/** True once the response has ended or the peer has disconnected. */
	readonly closed: boolean;
}

/** Statuses that must not carry a body */
const NULL_BODY_STATUSES = new Set([204, 205, 304]);

export function isNullBodyStatus(status: number): boolean {
	return NULL_BODY_STATUSES.has(status);
}

/**
 * Sink producing a Web `Response`, used by `Web.handle`.
 *
 * `response` resolves as soon as the headers are committed; a streamed body keeps
 * receiving chunks through the `ReadableStream` after that.
 */
export class WebResponseSink implements ResponseSink {
	readonly response: Promise<Response>;

	private resolveResponse: (response: Response) => void = () => {};
	private rejectResponse: (error: unknown) => void = () => {};
	private controller?: ReadableStreamDefaultController<Uint8Array>;
	private bodyless = false;
	private ended = false;
	private cancelled = false;

	/**
	 * @param discardBody - Drop body bytes (HEAD requests)
	 */
	constructor(private readonly discardBody = false) {
		this.response = new Promise((resolve, reject) => {
			this.resolveResponse = resolve;
			this.rejectResponse = reject;
		});
	}

	get closed(): boolean {
		return this.ended || this.cancelled;
	}

	start(status: number, headers: HeaderList): void {
		const webHeaders = new Headers();
		for (const [name, value] of headers) {
			webHeaders.append(name, value);
		}

		if (this.discardBody || NULL_BODY_STATUSES.has(status)) {
			this.bodyless = true;
			this.resolveResponse(new Response(null, { status, headers: webHeaders }));
			return;
		}

		const body = new ReadableStream<Uint8Array>({
			start: (controller) => {
				this.controller = controller;
			},
			cancel: () => {
				this.cancelled = true;
			},
		});
		this.resolveResponse(new Response(body, { status, headers: webHeaders }));
	}

	async write(chunk: Uint8Array): Promise<void> {
		if (this.bodyless) return;
		if (!this.controller || this.closed) throw new Error("Connection closed");
		this.controller.enqueue(chunk);
	}

	async end(chunk?: Uint8Array): Promise<void> {
		if (this.closed) return;
		this.ended = true;
		if (this.bodyless || !this.controller) return;

		if (chunk && chunk.length > 0) this.controller.enqueue(chunk);
		this.controller.close();
	}

	abort(error: unknown): void {
		if (this.closed) return;
		this.ended = true;
		// Before start() the promise is still pending; after it this is a no-op
		this.rejectResponse(error);
		this.controller?.error(error);
	}
}

/**
 * Sink writing to a Node.js `ServerResponse`. Each chunk is written to the socket as
 * soon as it is handed over.
 */
export class NodeResponseSink implements ResponseSink {
	/**
	 * @param res - Node.js response
	 * @param discardBody - Drop body bytes (HEAD requests)
	 */
	constructor(
		private readonly res: ServerResponse,
		private readonly discardBody = false
	) {}

	get closed(): boolean {
		return this.res.writableEnded || this.res.destroyed;
	}

	start(status: number, headers: HeaderList): void {
		this.res.writeHead(status, toOutgoingHeaders(headers));
	}

	write(chunk: Uint8Array): Promise<void> {
		if (this.discardBody) return Promise.resolve();

		return new Promise((resolve, reject) => {
			if (this.closed) {
				reject(new Error("Connection closed"));
				return;
			}
			this.res.write(chunk, (error) => (error ? reject(error) : resolve()));
		});
	}

	end(chunk?: Uint8Array): Promise<void> {
		return new Promise((resolve) => {
			if (this.closed) {
				resolve();
				return;
			}
			if (chunk && chunk.length > 0 && !this.discardBody) {
				this.res.end(chunk, () => resolve());
			} else {
				this.res.end(() => resolve());
			}
		});
	}

	abort(error: unknown): void {
		if (this.closed) return;
		this.res.destroy(error instanceof Error ? error : undefined);
	}
}

/**
 * Groups a header list into Node's header object, keeping repeated headers
 * (such as Set-Cookie) as arrays.
 */
export function toOutgoingHeaders(headers: HeaderList): OutgoingHttpHeaders {
	const result: OutgoingHttpHeaders = {};
	for (const [name, value] of headers) {
		const key = name.toLowerCase();
		const existing = result[key];
		if (existing === undefined) {
			result[key] = value;
		} else if (Array.isArray(existing)) {
			existing.push(value);
		} else {
			result[key] = [String(existing), value];
		}
	}
	return result;
}

/**
 * File reader backed by node:fs. Missing paths and directories fail with `FileNotFoundError`.
 */
export const nodeFileReader: FileReader = {
	async readFile(path: string): Promise<Uint8Array> {
		try {
			return await readFile(path);
		} catch (error) {
			if (isMissing(error)) throw new FileNotFoundError(path, { cause: error });
			throw error;
		}
	},
};

function isMissing(error: unknown): boolean {
	return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR" || error.code === "EISDIR");
}
