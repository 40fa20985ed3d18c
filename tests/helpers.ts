import type { Levels } from "@rabbit-company/logger";
import { FileNotFoundError } from "../packages/core/src";
import type { FileReader, HeaderList, ResponseSink, WebLogger } from "../packages/core/src";

const decoder = new TextDecoder();
const encoder = new TextEncoder();

export function mockRequest(path: string, method = "GET", headers: Record<string, string> = {}, body?: string): Request {
	return new Request(`http://localhost${path}`, {
		method,
		headers: {
			Host: "localhost",
			...headers,
		},
		body,
	});
}

export interface LogEntry {
	level: Levels;
	message: string;
	metadata?: Record<string, unknown>;
}

/** Logger keeping every entry in memory */
export class MemoryLogger implements WebLogger {
	readonly entries: LogEntry[] = [];

	log(level: Levels, message: string, metadata?: Record<string, unknown>): void {
		this.entries.push({ level, message, metadata });
	}

	messages(level: Levels): string[] {
		return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
	}
}

/** Sink recording what a writer sends */
export class MemorySink implements ResponseSink {
	status?: number;
	headers: HeaderList = [];
	chunks: string[] = [];
	starts = 0;
	ended = false;
	aborted = false;
	disconnected = false;
	failWrites = false;

	start(status: number, headers: HeaderList): void {
		this.starts++;
		this.status = status;
		this.headers = [...headers];
	}

	async write(chunk: Uint8Array): Promise<void> {
		if (this.failWrites) throw new Error("Connection reset");
		this.chunks.push(decoder.decode(chunk));
	}

	async end(chunk?: Uint8Array): Promise<void> {
		if (chunk && chunk.length > 0) this.chunks.push(decoder.decode(chunk));
		this.ended = true;
	}

	abort(): void {
		this.aborted = true;
	}

	get closed(): boolean {
		return this.ended || this.disconnected;
	}

	header(name: string): string | undefined {
		return this.headers.find(([header]) => header === name)?.[1];
	}

	headerValues(name: string): string[] {
		return this.headers.filter(([header]) => header === name).map(([, value]) => value);
	}

	get body(): string {
		return this.chunks.join("");
	}
}

/** File reader serving in-memory files */
export class MemoryFiles implements FileReader {
	readonly reads: string[] = [];

	constructor(
		private readonly files: Record<string, string>,
		private readonly broken: string[] = []
	) {}

	async readFile(path: string): Promise<Uint8Array> {
		this.reads.push(path);
		if (this.broken.includes(path)) throw new Error(`EIO: i/o error, read '${path}'`);

		const contents = this.files[path];
		if (contents === undefined) throw new FileNotFoundError(path);
		return encoder.encode(contents);
	}
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
