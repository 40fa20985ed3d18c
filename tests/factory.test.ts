import { describe, expect, it } from "vitest";
import { clonedInstances, freshInstances, InstanceCreationError } from "../packages/core/src";

class Counter {
	value = 0;
}

class Session {
	visits = 0;

	constructor(readonly counter: Counter) {}

	greet(): string {
		return `visit ${this.visits}`;
	}
}

class Copyable {
	constructor(readonly generation: number) {}

	clone(): Copyable {
		return new Copyable(this.generation + 1);
	}
}

describe("Instance factories", () => {
	it("should construct a new instance per call", () => {
		const factory = freshInstances(() => new Session(new Counter()));

		const first = factory.create();
		const second = factory.create();

		expect(factory.mode).toBe("fresh");
		expect(first).not.toBe(second);
		expect(first.counter).not.toBe(second.counter);
	});

	it("should wrap constructor failures", () => {
		const factory = freshInstances((): Session => {
			throw new Error("no database");
		});

		expect(() => factory.create()).toThrow(InstanceCreationError);
		expect(() => factory.create()).toThrow("Failed to construct application instance");
	});

	it("should copy the seed shallowly and keep its prototype", () => {
		const seed = new Session(new Counter());
		seed.visits = 3;
		const factory = clonedInstances(seed);

		const copy = factory.create();
		copy.visits++;

		expect(factory.mode).toBe("cloned");
		expect(copy).not.toBe(seed);
		expect(copy).toBeInstanceOf(Session);
		expect(copy.greet()).toBe("visit 4");
		expect(copy.counter).toBe(seed.counter);
		expect(seed.visits).toBe(3);
	});

	it("should prefer the seed's own clone()", () => {
		const factory = clonedInstances(new Copyable(1));

		expect(factory.create().generation).toBe(2);
		expect(factory.create().generation).toBe(2);
	});

	it("should copy private fields through the seed's own clone()", () => {
		class Vault {
			#counter: Counter;

			constructor(counter: Counter) {
				this.#counter = counter;
			}

			bump(): number {
				return ++this.#counter.value;
			}

			clone(): Vault {
				return new Vault(this.#counter);
			}
		}

		const seed = new Vault(new Counter());
		const factory = clonedInstances(seed);

		expect(factory.create().bump()).toBe(1);
		expect(factory.create().bump()).toBe(2);
		expect(seed.bump()).toBe(3);
	});

	it("should wrap clone failures", () => {
		const seed = {
			clone(): never {
				throw new Error("cannot copy");
			},
		};

		expect(() => clonedInstances(seed).create()).toThrow("Failed to clone application instance");
	});
});
