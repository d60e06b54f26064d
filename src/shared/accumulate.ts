/**
 * In-place accumulation over immutable Decimals.
 *
 * A Decimal never changes; an accumulator owns a single binding and replaces
 * it. Only total operations get an assigning form, so an accumulator can never
 * end up holding a failed division.
 */

import { Decimal } from "./decimal.js";

export class DecimalAccumulator {
	private current: Decimal;

	constructor(initial: Decimal = Decimal.zero()) {
		this.current = initial;
	}

	get value(): Decimal {
		return this.current;
	}

	addAssign(other: Decimal): this {
		this.current = this.current.add(other);
		return this;
	}

	subAssign(other: Decimal): this {
		this.current = this.current.sub(other);
		return this;
	}

	mulAssign(other: Decimal): this {
		this.current = this.current.mul(other);
		return this;
	}
}

/**
 * Left-to-right sum starting from zero. An empty input sums to zero.
 * @example sum([one, two, three]) // 6
 */
export function sum(values: Iterable<Decimal>): Decimal {
	const acc = new DecimalAccumulator();
	for (const value of values) {
		acc.addAssign(value);
	}
	return acc.value;
}
