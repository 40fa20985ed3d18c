import { availableParallelism } from "node:os";
import { PoolClosedError } from "./errors";

type Job = () => Promise<void>;

/**
 * Default size of both the listener group and the worker pool: half the available
 * parallelism, at least 1.
 *
 * @example
 * ```typescript
 * defaultConcurrency(8); // 4
 * defaultConcurrency(1); // 1
 * ```
 */
export function defaultConcurrency(parallelism: number = availableParallelism()): number {
	return Math.max(Math.floor(parallelism / 2), 1);
}

/**
 * Fixed number of slots executing handler tasks, fed from an unbounded FIFO queue.
 *
 * A task holds its slot until the promise it returns settles, so at most `size`
 * tasks are in progress at any time. Tasks start in submission order.
 *
 * @example
 * ```typescript
 * const pool = new WorkerPool(4);
 * const body = await pool.submit(async () => render(page));
 * await pool.shutdown();
 * ```
 */
export class WorkerPool {
	private readonly queue: Job[] = [];
	private active = 0;
	private closed = false;
	private idleWaiters: Array<() => void> = [];

	constructor(readonly size: number = defaultConcurrency()) {
		if (!Number.isInteger(size) || size < 1) {
			throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
		}
	}

	/** Tasks waiting for a slot */
	get pending(): number {
		return this.queue.length;
	}

	/** Tasks currently holding a slot */
	get running(): number {
		return this.active;
	}

	get isClosed(): boolean {
		return this.closed;
	}

	/**
	 * Queues a task and resolves with its result once it has run.
	 *
	 * @throws {PoolClosedError} after `shutdown()`
	 */
	submit<T>(task: () => T | Promise<T>): Promise<T> {
		if (this.closed) return Promise.reject(new PoolClosedError());

		return new Promise<T>((resolve, reject) => {
			this.queue.push(() => Promise.resolve().then(task).then(resolve, reject));
			this.drain();
		});
	}

	/**
	 * Resolves once the queue is empty and no task is running.
	 */
	join(): Promise<void> {
		if (this.active === 0 && this.queue.length === 0) return Promise.resolve();
		return new Promise((resolve) => {
			this.idleWaiters.push(resolve);
		});
	}

	/**
	 * Rejects new submissions and waits for queued and running tasks to finish.
	 */
	shutdown(): Promise<void> {
		this.closed = true;
		return this.join();
	}

	private drain(): void {
		while (this.active < this.size) {
			const job = this.queue.shift();
			if (!job) break;

			this.active++;
			void job().finally(() => {
				this.active--;
				this.drain();
				this.notifyIdle();
			});
		}
	}

	private notifyIdle(): void {
		if (this.active !== 0 || this.queue.length !== 0) return;

		const waiters = this.idleWaiters;
		this.idleWaiters = [];
		for (const resolve of waiters) resolve();
	}
}
