/**
 * Decimal — immutable, exact, finite-only decimal value.
 *
 * Wraps the fixed-width LibDecimal primitive (34 significant digits) and
 * guarantees that a Decimal never holds NaN or Infinity:
 * - parsing rejects the NaN/Infinity spellings the grammar accepts,
 * - div, rem and pow return a Result and fail on a non-finite result,
 * - add, sub, mul and mulAdd are total; leaving the exponent range is a defect.
 *
 * Equality, ordering and hashing are numeric: "1.0", "1.00" and "1" are the
 * same key.
 */

import { LibDecimal } from "../lib/decimal/index.js";
import {
	InvariantViolationError,
	NonFiniteError,
	NonFiniteResultError,
	ParseError,
} from "./errors.js";
import { getLogger } from "./log.js";
import { type Result, err, ok } from "./result.js";

const I64_MIN = -(2n ** 63n);
const U64_MAX = 2n ** 64n - 1n;

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

export type Ordering = -1 | 0 | 1;

/** Parse failures: the text is not a literal, or it spells NaN/Infinity. */
export type DecimalParseError = ParseError | NonFiniteError;

function raise(error: InvariantViolationError): never {
	getLogger().error(error.toJSON(), error.message);
	throw error;
}

/**
 * Promotes a partial comparison to a total one. Two finite values always
 * compare, so an undefined ordering is an invariant violation and throws.
 */
export function totalOrdering(
	partial: Ordering | undefined,
	left: string,
	right: string,
): Ordering {
	if (partial === undefined) {
		raise(
			new InvariantViolationError(`Ordering not possible between ${left} and ${right}`, {
				left,
				right,
			}),
		);
	}
	return partial;
}

export class Decimal {
	private static readonly ZERO = new Decimal(LibDecimal.zero());
	private static readonly ONE = new Decimal(LibDecimal.one());

	private readonly raw: LibDecimal;

	private constructor(raw: LibDecimal) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	static zero(): Decimal {
		return Decimal.ZERO;
	}

	static one(): Decimal {
		return Decimal.ONE;
	}

	/**
	 * Parses a decimal literal: optional sign, digits, optional fraction,
	 * optional exponent. Reports exactly one reason on failure.
	 * @example Decimal.parse("-12.50e3") // ok(-12500)
	 * @example Decimal.parse("NaN") // err(NonFiniteError "NaN is not supported")
	 * @example Decimal.parse("12,5") // err(ParseError)
	 */
	static parse(text: string): Result<Decimal, DecimalParseError> {
		const raw = LibDecimal.parse(text);
		if (raw === undefined) {
			return err(new ParseError(`Failed to parse "${text}" as a decimal`, { input: text }));
		}
		switch (raw.classify()) {
			case "nan":
				return err(new NonFiniteError("NaN is not supported", { input: text }));
			case "infinite":
				return err(new NonFiniteError("Infinity is not supported", { input: text }));
			case "finite":
				return ok(new Decimal(raw));
		}
	}

	/**
	 * Exact conversion from a 32- or 64-bit, signed or unsigned integer.
	 * Accepts safe-integer numbers and bigints in [-2^63, 2^64 - 1].
	 * @throws RangeError for a non-integer number or an out-of-range bigint
	 */
	static fromInteger(value: number | bigint): Decimal {
		if (typeof value === "number") {
			if (!Number.isSafeInteger(value)) {
				throw new RangeError(`Decimal.fromInteger: ${value} is not a safe integer`);
			}
			return new Decimal(LibDecimal.fromBigInt(BigInt(value)));
		}
		if (value < I64_MIN || value > U64_MAX) {
			throw new RangeError(`Decimal.fromInteger: ${value} is outside the 64-bit integer range`);
		}
		return new Decimal(LibDecimal.fromBigInt(value));
	}

	/**
	 * Converts a float through its default text form, so 0.1 becomes exactly
	 * 0.1 rather than the binary value nearest to it.
	 * @example Decimal.fromNumber(1234.56) // ok(1234.56)
	 */
	static fromNumber(value: number): Result<Decimal, DecimalParseError> {
		return Decimal.parse(String(value));
	}

	static isDecimal(value: unknown): value is Decimal {
		return value instanceof Decimal;
	}

	private static total(raw: LibDecimal, op: string): Decimal {
		if (!raw.isFinite()) {
			raise(
				new InvariantViolationError(`${op} left the finite decimal range`, {
					op,
					result: raw.toString(),
				}),
			);
		}
		return new Decimal(raw);
	}

	private static guarded(
		raw: LibDecimal,
		symbol: string,
		left: Decimal,
		right: Decimal,
	): Result<Decimal, NonFiniteResultError> {
		if (raw.isFinite()) return ok(new Decimal(raw));
		const expression = `${left.toString()} ${symbol} ${right.toString()}`;
		return err(
			new NonFiniteResultError(
				`Only finite values are supported: ${expression} produced ${raw.toString()}`,
				{ expression, result: raw.toString() },
			),
		);
	}

	// ── Arithmetic (immutable, total) ──────────────────────────────

	add(other: Decimal): Decimal {
		return Decimal.total(this.raw.add(other.raw), "add");
	}

	sub(other: Decimal): Decimal {
		return Decimal.total(this.raw.sub(other.raw), "sub");
	}

	mul(other: Decimal): Decimal {
		return Decimal.total(this.raw.mul(other.raw), "mul");
	}

	/** `this × a + b` with a single rounding at the end. */
	mulAdd(a: Decimal, b: Decimal): Decimal {
		return Decimal.total(this.raw.mulAdd(a.raw, b.raw), "mulAdd");
	}

	neg(): Decimal {
		return new Decimal(this.raw.neg());
	}

	abs(): Decimal {
		return new Decimal(this.raw.abs());
	}

	max(other: Decimal): Decimal {
		return new Decimal(this.raw.max(other.raw));
	}

	min(other: Decimal): Decimal {
		return new Decimal(this.raw.min(other.raw));
	}

	// ── Arithmetic (guarded) ───────────────────────────────────────

	/**
	 * Division rounded to 34 significant digits.
	 * @example one.div(Decimal.zero()) // err(NonFiniteResultError)
	 */
	div(other: Decimal): Result<Decimal, NonFiniteResultError> {
		return Decimal.guarded(this.raw.div(other.raw), "/", this, other);
	}

	/**
	 * Truncating remainder: the result has the sign of `this`. Fails for a zero
	 * divisor and when the integer quotient needs more than 34 digits.
	 */
	rem(other: Decimal): Result<Decimal, NonFiniteResultError> {
		return Decimal.guarded(this.raw.rem(other.raw), "%", this, other);
	}

	/**
	 * Fails for zero raised to a negative power, a negative base with a
	 * fractional exponent, and results beyond the exponent range.
	 */
	pow(exponent: Decimal): Result<Decimal, NonFiniteResultError> {
		return Decimal.guarded(this.raw.pow(exponent.raw), "^", this, exponent);
	}

	// ── Predicates ─────────────────────────────────────────────────

	isZero(): boolean {
		return this.raw.isZero();
	}

	/** Strictly less than zero. */
	isNegative(): boolean {
		return this.raw.isNegative();
	}

	isPositive(): boolean {
		return this.raw.isPositive();
	}

	// ── Comparison ─────────────────────────────────────────────────

	eq(other: Decimal): boolean {
		return this.raw.eq(other.raw);
	}

	partialCmp(other: Decimal): Ordering | undefined {
		return this.raw.partialCmp(other.raw);
	}

	cmp(other: Decimal): Ordering {
		return totalOrdering(this.raw.partialCmp(other.raw), this.toString(), other.toString());
	}

	gt(other: Decimal): boolean {
		return this.cmp(other) > 0;
	}

	gte(other: Decimal): boolean {
		return this.cmp(other) >= 0;
	}

	lt(other: Decimal): boolean {
		return this.cmp(other) < 0;
	}

	lte(other: Decimal): boolean {
		return this.cmp(other) <= 0;
	}

	/** Comparator for `Array.prototype.sort`: ascending numeric order. */
	static compare(a: Decimal, b: Decimal): Ordering {
		return a.cmp(b);
	}

	// ── Hashing ────────────────────────────────────────────────────

	/** Equal for every spelling of the same number; use as a Map key. */
	hashKey(): string {
		return this.raw.hashKey();
	}

	/** 32-bit FNV-1a hash of {@link hashKey}. */
	hashCode(): number {
		const key = this.hashKey();
		let hash = FNV_OFFSET;
		for (let i = 0; i < key.length; i++) {
			hash ^= key.charCodeAt(i);
			hash = Math.imul(hash, FNV_PRIME);
		}
		return hash >>> 0;
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Canonical text: plain notation for exponents between -7 and 21,
	 * exponential outside, no trailing zeros.
	 * @example Decimal.parse("1.500") // toString() === "1.5"
	 */
	toString(): string {
		return this.raw.toString();
	}

	/** JSON always carries the canonical string, never a JSON number. */
	toJSON(): string {
		return this.toString();
	}

	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	toExponential(places?: number): string {
		return this.raw.toExponential(places);
	}

	/** Converts to a JavaScript number. Use with caution - may lose precision. */
	toNumber(): number {
		return this.raw.toNumber();
	}
}
