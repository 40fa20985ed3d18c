import cluster from "node:cluster";
import type { Worker } from "node:cluster";
import { Levels } from "@rabbit-company/logger";
import type { Server, WebLogger } from "./types";

/** Environment variable telling a forked process its listener number */
export const LISTENER_ENV = "WEB_LISTENER_ID";

export interface ListenerGroupOptions {
	/** Number of listener processes to fork */
	listeners: number;
	port: number;
	hostname: string;
	logger: WebLogger;
	/** Max restarts per listener per minute (default: 5) */
	maxRestarts?: number;
	/** Graceful shutdown timeout in ms (default: 30s) */
	shutdownTimeout?: number;
}

/**
 * Listener number of the current process: the forked listener's number inside a
 * cluster worker, 1 otherwise.
 */
export function currentListenerId(): number {
	const id = Number(process.env[LISTENER_ENV]);
	return Number.isInteger(id) && id > 0 ? id : 1;
}

/**
 * Supervises the listener processes of a server running in cluster mode.
 *
 * The primary forks one process per listener; each re-runs the application's
 * registration and binds the shared address, so node:cluster spreads accepted
 * connections across them. Crashed listeners are restarted (bounded per minute)
 * and SIGINT/SIGTERM stop the whole group.
 *
 * @example
 * ```typescript
 * const group = new ListenerGroup({ listeners: 4, port: 3000, hostname: 'localhost', logger });
 * await group.start();
 * // ...
 * await group.stop();
 * ```
 */
export class ListenerGroup implements Server {
	readonly port: number;
	readonly hostname: string;
	readonly role = "primary";
	readonly closed: Promise<void>;

	private workers = new Map<number, Worker>();
	private restartCounts = new Map<number, number[]>();
	private ready = new Set<number>();
	private shuttingDown = false;
	private stopping?: Promise<void>;
	private resolveClosed: () => void = () => {};
	private resolveReady: () => void = () => {};
	private rejectReady: (error: Error) => void = () => {};

	private readonly listeners: number;
	private readonly logger: WebLogger;
	private readonly maxRestarts: number;
	private readonly shutdownTimeout: number;
	private readonly onSignal = (): void => {
		void this.stop();
	};

	constructor(options: ListenerGroupOptions) {
		this.listeners = options.listeners;
		this.port = options.port;
		this.hostname = options.hostname;
		this.logger = options.logger;
		this.maxRestarts = options.maxRestarts ?? 5;
		this.shutdownTimeout = options.shutdownTimeout ?? 30000;
		this.closed = new Promise((resolve) => {
			this.resolveClosed = resolve;
		});
	}

	/**
	 * Forks every listener and resolves once all of them are bound.
	 *
	 * @throws {Error} when called outside the primary process, or when a listener
	 * keeps failing before it is ready
	 */
	start(): Promise<void> {
		if (!cluster.isPrimary) {
			throw new Error("ListenerGroup.start() can only be called from the primary process");
		}

		const ready = new Promise<void>((resolve, reject) => {
			this.resolveReady = resolve;
			this.rejectReady = reject;
		});

		for (let listener = 1; listener <= this.listeners; listener++) {
			this.fork(listener);
		}

		process.on("SIGTERM", this.onSignal);
		process.on("SIGINT", this.onSignal);

		return ready;
	}

	/**
	 * Asks every listener to finish its in-flight requests, then kills the ones still
	 * running after the shutdown timeout.
	 */
	stop(): Promise<void> {
		if (!this.stopping) this.stopping = this.shutdown();
		return this.stopping;
	}

	/** Process IDs of the running listeners */
	pids(): number[] {
		return Array.from(this.workers.values())
			.map((worker) => worker.process.pid)
			.filter((pid): pid is number => pid !== undefined);
	}

	private fork(listener: number): void {
		const worker = cluster.fork({ [LISTENER_ENV]: String(listener) });
		this.workers.set(listener, worker);

		worker.on("message", (message: unknown) => {
			if (message !== "ready" || this.ready.has(listener)) return;
			this.ready.add(listener);
			if (this.ready.size === this.listeners) {
				this.logger.log(Levels.INFO, `All ${this.listeners} listeners ready on http://${this.hostname}:${this.port}`);
				this.resolveReady();
			}
		});

		worker.on("exit", (code: number, signal: string) => {
			this.workers.delete(listener);
			if (this.shuttingDown) return;

			this.logger.log(Levels.WARN, `Listener ${listener} exited`, { code, signal, pid: worker.process.pid });
			this.ready.delete(listener);
			this.maybeRestart(listener);
		});

		this.logger.log(Levels.INFO, `Forked listener ${listener}`, { pid: worker.process.pid });
	}

	private maybeRestart(listener: number): void {
		const now = Date.now();
		const minute = 60000;

		// Remove restarts older than a minute
		const restarts = (this.restartCounts.get(listener) ?? []).filter((time) => time > now - minute);

		if (restarts.length >= this.maxRestarts) {
			this.logger.log(Levels.ERROR, `Listener ${listener} exceeded max restarts (${this.maxRestarts}/min), not restarting`);
			this.rejectReady(new Error(`Listener ${listener} failed to start`));
			return;
		}

		restarts.push(now);
		this.restartCounts.set(listener, restarts);
		this.logger.log(Levels.INFO, `Restarting listener ${listener}`);
		this.fork(listener);
	}

	private async shutdown(): Promise<void> {
		this.shuttingDown = true;
		process.off("SIGTERM", this.onSignal);
		process.off("SIGINT", this.onSignal);

		this.logger.log(Levels.INFO, "Shutting down listeners");
		for (const worker of this.workers.values()) {
			if (worker.isConnected()) worker.send("shutdown");
		}

		const deadline = Date.now() + this.shutdownTimeout;
		while (this.workers.size > 0 && Date.now() < deadline) {
			await new Promise((resolve) => setTimeout(resolve, 100));
		}

		for (const worker of this.workers.values()) {
			worker.kill("SIGKILL");
		}
		this.workers.clear();

		this.resolveClosed();
	}
}
