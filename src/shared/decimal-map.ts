import { Decimal } from "./decimal.js";

interface Entry<V> {
	readonly key: Decimal;
	value: V;
}

/**
 * Map keyed by numeric value: `1`, `1.0` and `1.00` address the same entry.
 *
 * Iteration follows insertion order; {@link sortedEntries} gives ascending key
 * order. Setting an existing key replaces the value and keeps the first key.
 *
 * @example
 * ```ts
 * const balances = new DecimalMap<string>();
 * balances.set(unwrap(Decimal.parse("1.0")), "a");
 * balances.get(unwrap(Decimal.parse("1.00"))); // "a"
 * ```
 */
export class DecimalMap<V> {
	private readonly entriesByKey = new Map<string, Entry<V>>();

	get size(): number {
		return this.entriesByKey.size;
	}

	set(key: Decimal, value: V): this {
		const hashKey = key.hashKey();
		const existing = this.entriesByKey.get(hashKey);
		if (existing) {
			existing.value = value;
		} else {
			this.entriesByKey.set(hashKey, { key, value });
		}
		return this;
	}

	get(key: Decimal): V | undefined {
		return this.entriesByKey.get(key.hashKey())?.value;
	}

	has(key: Decimal): boolean {
		return this.entriesByKey.has(key.hashKey());
	}

	delete(key: Decimal): boolean {
		return this.entriesByKey.delete(key.hashKey());
	}

	clear(): void {
		this.entriesByKey.clear();
	}

	*entries(): IterableIterator<[Decimal, V]> {
		for (const entry of this.entriesByKey.values()) {
			yield [entry.key, entry.value];
		}
	}

	*keys(): IterableIterator<Decimal> {
		for (const entry of this.entriesByKey.values()) {
			yield entry.key;
		}
	}

	*values(): IterableIterator<V> {
		for (const entry of this.entriesByKey.values()) {
			yield entry.value;
		}
	}

	[Symbol.iterator](): IterableIterator<[Decimal, V]> {
		return this.entries();
	}

	/** Entries in ascending key order. */
	sortedEntries(): Array<[Decimal, V]> {
		return [...this.entries()].sort(([a], [b]) => Decimal.compare(a, b));
	}
}
