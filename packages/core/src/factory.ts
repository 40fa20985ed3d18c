import { InstanceCreationError } from "./errors";
import type { Cloneable, InstanceFactory } from "./types";

/**
 * Builds a brand-new application instance for every request.
 *
 * State is never carried from one request to the next unless `create` captures
 * an explicitly shared handle.
 *
 * @example
 * ```typescript
 * const visits = new Counter();
 * app.useInstances(freshInstances(() => new MyApp(visits)));
 * ```
 */
export function freshInstances<A>(create: () => A): InstanceFactory<A> {
	return {
		mode: "fresh",
		create: () => {
			try {
				return create();
			} catch (error) {
				throw new InstanceCreationError("Failed to construct application instance", { cause: error });
			}
		},
	};
}

/**
 * Hands each request a copy of one seed instance.
 *
 * A seed implementing `clone()` copies itself; any other object is copied shallowly
 * with its prototype kept, so fields holding shared handles keep pointing at the same
 * objects while plain values start from the seed's values.
 *
 * The shallow copy only sees own enumerable properties. A class with `#private` fields
 * must implement `clone()`, or its methods fail on the copy.
 *
 * @example
 * ```typescript
 * class MyApp {
 *   #visits: Counter;
 *
 *   constructor(visits: Counter) {
 *     this.#visits = visits;
 *   }
 *
 *   clone(): MyApp {
 *     return new MyApp(this.#visits);
 *   }
 * }
 *
 * app.useInstances(clonedInstances(new MyApp(new Counter())));
 * ```
 */
export function clonedInstances<A>(seed: A): InstanceFactory<A> {
	return {
		mode: "cloned",
		create: () => {
			try {
				return copyInstance(seed);
			} catch (error) {
				throw new InstanceCreationError("Failed to clone application instance", { cause: error });
			}
		},
	};
}

function copyInstance<A>(seed: A): A {
	if (isCloneable<A>(seed)) return seed.clone();
	if (typeof seed !== "object" || seed === null) return seed;

	const copy: A & object = Object.create(Object.getPrototypeOf(seed));
	return Object.assign(copy, seed);
}

function isCloneable<A>(value: unknown): value is Cloneable<A> {
	return typeof value === "object" && value !== null && "clone" in value && typeof value.clone === "function";
}
