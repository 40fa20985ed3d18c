import { ConsoleTransport, Levels, Logger } from "@rabbit-company/logger";
import type { WebLogger } from "./types";

/**
 * Options for the default framework logger.
 */
export interface WebLoggerOptions {
	/**
	 * Lowest level written.
	 * Default: Levels.INFO
	 */
	level?: Levels;

	/**
	 * Whether to write to the console.
	 * Default: true
	 */
	console?: boolean;
}

/**
 * Creates the logger a `Web` application uses when none is configured.
 *
 * Access lines are written at `Levels.HTTP`, so raise the level to at least
 * `Levels.HTTP` to see them.
 *
 * @example
 * ```typescript
 * const app = new Web<MyApp>({
 *   logger: createWebLogger({ level: Levels.HTTP }),
 * });
 *
 * // Or bring your own logger with extra transports
 * const logger = new Logger({
 *   level: Levels.INFO,
 *   transports: [new ConsoleTransport(), new LokiTransport({ url: "http://localhost:3100" })],
 * });
 * const app = new Web<MyApp>({ logger });
 * ```
 */
export function createWebLogger(options: WebLoggerOptions = {}): Logger {
	const { level = Levels.INFO, console = true } = options;

	return new Logger({
		level,
		transports: console ? [new ConsoleTransport()] : [],
	});
}

/**
 * One served request, as recorded in the access log.
 */
export interface AccessEntry {
	method: string;
	path: string;
	status: number;
	/** Milliseconds from accept to response commit */
	duration: number;
	clientIp?: string;
}

/**
 * Formats the access line: `METHOD path status durationms`.
 *
 * @example
 * ```typescript
 * formatAccessLine({ method: "GET", path: "/hello/Jane/Doe", status: 200, duration: 3 });
 * // "GET /hello/Jane/Doe 200 3ms"
 * ```
 */
export function formatAccessLine(entry: AccessEntry): string {
	return `${entry.method} ${entry.path} ${entry.status} ${entry.duration}ms`;
}

/**
 * Writes one access line at `Levels.HTTP`.
 */
export function logAccess(logger: WebLogger, entry: AccessEntry): void {
	logger.log(Levels.HTTP, formatAccessLine(entry), {
		...(entry.clientIp ? { clientIp: entry.clientIp } : {}),
		duration: entry.duration,
		response: { statusCode: entry.status },
	});
}

/**
 * Metadata describing a caught error.
 */
export function errorMetadata(error: unknown): Record<string, unknown> {
	return {
		error: {
			name: error instanceof Error ? error.name : "Unknown",
			message: error instanceof Error ? error.message : String(error),
			stack: error instanceof Error ? error.stack : undefined,
		},
	};
}
