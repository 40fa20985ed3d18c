import { describe, expect, it } from "vitest";
import { defaultConcurrency, PoolClosedError, WorkerPool } from "../packages/core/src";

function deferred(): { promise: Promise<void>; resolve: () => void } {
	let resolve: () => void = () => {};
	const promise = new Promise<void>((r) => {
		resolve = r;
	});
	return { promise, resolve };
}

describe("WorkerPool", () => {
	it("should size itself to half the parallelism, at least 1", () => {
		expect(defaultConcurrency(8)).toBe(4);
		expect(defaultConcurrency(7)).toBe(3);
		expect(defaultConcurrency(1)).toBe(1);
		expect(defaultConcurrency(0)).toBe(1);
	});

	it("should reject a non-positive size", () => {
		expect(() => new WorkerPool(0)).toThrow(RangeError);
	});

	it("should resolve with the task result", async () => {
		const pool = new WorkerPool(2);
		await expect(pool.submit(() => 42)).resolves.toBe(42);
		await expect(pool.submit(async () => "done")).resolves.toBe("done");
	});

	it("should reject with the task error", async () => {
		const pool = new WorkerPool(1);
		await expect(
			pool.submit(() => {
				throw new Error("boom");
			})
		).rejects.toThrow("boom");

		// The slot is released after a failure
		await expect(pool.submit(() => "next")).resolves.toBe("next");
	});

	it("should never run more tasks than its size", async () => {
		const pool = new WorkerPool(2);
		const gates = [deferred(), deferred(), deferred(), deferred()];
		let running = 0;
		let peak = 0;

		const tasks = gates.map((gate) =>
			pool.submit(async () => {
				running++;
				peak = Math.max(peak, running);
				await gate.promise;
				running--;
			})
		);

		await Promise.resolve();
		await Promise.resolve();
		expect(pool.running).toBe(2);
		expect(pool.pending).toBe(2);

		for (const gate of gates) gate.resolve();
		await Promise.all(tasks);

		expect(peak).toBe(2);
		expect(pool.running).toBe(0);
		expect(pool.pending).toBe(0);
	});

	it("should start queued tasks in submission order", async () => {
		const pool = new WorkerPool(1);
		const order: number[] = [];

		await Promise.all([1, 2, 3, 4].map((n) => pool.submit(() => order.push(n))));

		expect(order).toEqual([1, 2, 3, 4]);
	});

	it("should wait for running tasks on shutdown and reject new ones", async () => {
		const pool = new WorkerPool(1);
		const gate = deferred();
		let finished = false;

		const task = pool.submit(async () => {
			await gate.promise;
			finished = true;
		});

		const shutdown = pool.shutdown();
		expect(pool.isClosed).toBe(true);
		await expect(pool.submit(() => 1)).rejects.toBeInstanceOf(PoolClosedError);

		gate.resolve();
		await shutdown;
		await task;
		expect(finished).toBe(true);
	});

	it("should join immediately when idle", async () => {
		const pool = new WorkerPool(1);
		await expect(pool.join()).resolves.toBeUndefined();
	});
});
