/**
 * Derives the lookup identity of a key. Two keys with the same identity address
 * the same value set.
 */
export type KeyOf<K> = (key: K) => string | number | boolean | bigint;

type Bucket<K, V> = { key: K; values: Set<V> };

/**
 * A mapping from a key to a de-duplicated set of values.
 *
 * Keys are compared by the identity returned from `keyOf` (default: the key
 * itself), so composite keys such as `TransitionKey` can be addressed by value.
 * Values are compared by reference.
 *
 * All reads hand out snapshots. Every method is synchronous, so a call runs to
 * completion before any other code can touch the collection; callers may
 * freely mutate the collection while iterating a snapshot they took earlier.
 *
 * @template K - Key type
 * @template V - Value type
 *
 * @example
 * ```typescript
 * const map = new MultiKeyCollection<string, string>();
 * map.put("A", "a1"); // true
 * map.put("A", "a1"); // false (already present)
 * for (const v of map.valuesClone("A")) map.removeMapping("A", v);
 * map.containsKey("A"); // false
 * ```
 */
export class MultiKeyCollection<K, V> {
	#buckets = new Map<unknown, Bucket<K, V>>();

	#keyOf: (key: K) => unknown;

	constructor(keyOf?: KeyOf<K>) {
		this.#keyOf = keyOf ?? ((key: K) => key);
	}

	/**
	 * Adds `value` under `key`.
	 * @returns `false` if the pair was already present, `true` otherwise
	 */
	put(key: K, value: V): boolean {
		const id = this.#keyOf(key);
		let bucket = this.#buckets.get(id);
		if (!bucket) {
			bucket = { key, values: new Set() };
			this.#buckets.set(id, bucket);
		}
		if (bucket.values.has(value)) return false;
		bucket.values.add(value);
		return true;
	}

	/**
	 * Removes `key` and all its values.
	 * @returns The values formerly stored under `key` (empty if none)
	 */
	remove(key: K): Set<V> {
		const id = this.#keyOf(key);
		const bucket = this.#buckets.get(id);
		if (!bucket) return new Set();
		this.#buckets.delete(id);
		return bucket.values;
	}

	/**
	 * Removes a single `(key, value)` pair. A key left without values is dropped.
	 * @returns `true` if the pair existed
	 */
	removeMapping(key: K, value: V): boolean {
		const id = this.#keyOf(key);
		const bucket = this.#buckets.get(id);
		if (!bucket) return false;
		const removed = bucket.values.delete(value);
		if (bucket.values.size === 0) {
			this.#buckets.delete(id);
		}
		return removed;
	}

	get isEmpty(): boolean {
		return this.#buckets.size === 0;
	}

	containsKey(key: K): boolean {
		return this.#buckets.has(this.#keyOf(key));
	}

	containsValue(value: V): boolean {
		for (const bucket of this.#buckets.values()) {
			if (bucket.values.has(value)) return true;
		}
		return false;
	}

	containsMapping(key: K, value: V): boolean {
		return this.#buckets.get(this.#keyOf(key))?.values.has(value) ?? false;
	}

	clear(): void {
		this.#buckets.clear();
	}

	/**
	 * Returns an independent copy of the values under `key`.
	 * Later changes to the collection never show up in a returned set.
	 */
	valuesClone(key: K): Set<V> {
		return new Set(this.#buckets.get(this.#keyOf(key))?.values);
	}

	/** Returns a copy of every value, across all keys, in insertion order. */
	allValuesClone(): V[] {
		const out: V[] = [];
		for (const bucket of this.#buckets.values()) {
			out.push(...bucket.values);
		}
		return out;
	}

	/** Returns a copy of the keys, in insertion order. */
	keySetClone(): K[] {
		return [...this.#buckets.values()].map((bucket) => bucket.key);
	}

	/**
	 * Calls `cb` for every `(value, key)` pair. Iterates over a snapshot, so `cb`
	 * may mutate the collection.
	 */
	forEach(cb: (value: V, key: K) => void): void {
		const snapshot = [...this.#buckets.values()].map(
			(bucket) => [bucket.key, [...bucket.values]] as const
		);
		for (const [key, values] of snapshot) {
			for (const value of values) cb(value, key);
		}
	}

	keyCount(): number {
		return this.#buckets.size;
	}

	/** Number of values under `key`; 0 for a missing key. */
	valueCount(key: K): number {
		return this.#buckets.get(this.#keyOf(key))?.values.size ?? 0;
	}

	/** Total number of values across all keys. */
	valuesCount(): number {
		let count = 0;
		for (const bucket of this.#buckets.values()) count += bucket.values.size;
		return count;
	}
}
