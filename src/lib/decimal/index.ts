/**
 * LibDecimal — domain-agnostic wrapper around decimal.js.
 *
 * Configures decimal.js as a fixed-width primitive (34 significant digits,
 * round half to even, truncating remainder) and exposes the raw operations,
 * NaN/Infinity classification included. Non-finite payloads are legal here;
 * the shared/decimal facade is the layer that refuses them.
 * Domain code never imports decimal.js directly.
 */
import { Decimal as DecimalJs } from "decimal.js";

/** Significant digits carried by every value. */
export const PRECISION = 34;

const Primitive = DecimalJs.clone({
	precision: PRECISION,
	rounding: DecimalJs.ROUND_HALF_EVEN,
	modulo: DecimalJs.ROUND_DOWN,
	toExpNeg: -7,
	toExpPos: 21,
});

const QUOTIENT_LIMIT = new Primitive(`1e${PRECISION}`);

// Wide enough to hold the exact product of two PRECISION-digit operands.
const Wide = Primitive.clone({ precision: PRECISION * 2 + 2 });

const DECIMAL_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;
const NON_FINITE_LITERAL = /^([+-]?)(s?nan|inf|infinity)$/i;

/** Classification of a primitive payload. */
export type NumberClass = "finite" | "nan" | "infinite";

export class LibDecimal {
	private readonly raw: DecimalJs;

	private constructor(raw: DecimalJs) {
		this.raw = raw;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * Parses a literal. Accepts decimal notation with an optional exponent and
	 * the NaN/Infinity spellings; returns undefined for anything else.
	 * Finite values are rounded to PRECISION significant digits.
	 * @example LibDecimal.parse("1.50") // 1.5
	 * @example LibDecimal.parse("-inf")?.classify() // "infinite"
	 */
	static parse(text: string): LibDecimal | undefined {
		if (DECIMAL_LITERAL.test(text)) {
			return LibDecimal.rounded(new Primitive(text));
		}
		const special = NON_FINITE_LITERAL.exec(text);
		if (special) {
			const sign = special[1] ?? "";
			const body = special[2]?.toLowerCase().endsWith("nan") ? "NaN" : "Infinity";
			return new LibDecimal(new Primitive(`${sign}${body}`));
		}
		return undefined;
	}

	/**
	 * Exact conversion from an integer.
	 * @example LibDecimal.fromBigInt(18446744073709551615n)
	 */
	static fromBigInt(value: bigint): LibDecimal {
		return LibDecimal.rounded(new Primitive(value.toString()));
	}

	static zero(): LibDecimal {
		return new LibDecimal(new Primitive(0));
	}

	static one(): LibDecimal {
		return new LibDecimal(new Primitive(1));
	}

	private static rounded(raw: DecimalJs): LibDecimal {
		if (!raw.isFinite()) return new LibDecimal(raw);
		return new LibDecimal(raw.toSignificantDigits(PRECISION, DecimalJs.ROUND_HALF_EVEN));
	}

	// ── Classification ─────────────────────────────────────────────

	classify(): NumberClass {
		if (this.raw.isNaN()) return "nan";
		return this.raw.isFinite() ? "finite" : "infinite";
	}

	isFinite(): boolean {
		return this.raw.isFinite();
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	/** True when strictly below zero; `-0` is not negative. */
	isNegative(): boolean {
		return this.raw.lessThan(0);
	}

	isPositive(): boolean {
		return this.raw.greaterThan(0);
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.plus(other.raw));
	}

	sub(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.minus(other.raw));
	}

	mul(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.times(other.raw));
	}

	/** `x / 0` is Infinity, `0 / 0` is NaN. */
	div(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.dividedBy(other.raw));
	}

	/**
	 * Truncating remainder; the result takes the sign of the dividend. `x % 0`
	 * is NaN, and so is any pair whose integer quotient needs more than
	 * PRECISION digits (division impossible).
	 */
	rem(other: LibDecimal): LibDecimal {
		if (this.quotientExceedsPrecision(other)) {
			return new LibDecimal(new Primitive(Number.NaN));
		}
		return new LibDecimal(this.raw.modulo(other.raw));
	}

	// |this / divisor| >= 10^PRECISION, decided from the exponents alone except
	// when they are exactly PRECISION apart.
	private quotientExceedsPrecision(divisor: LibDecimal): boolean {
		const x = this.raw;
		const y = divisor.raw;
		if (!x.isFinite() || !y.isFinite() || x.isZero() || y.isZero()) return false;
		const spread = x.e - y.e;
		if (spread !== PRECISION) return spread > PRECISION;
		return x.abs().greaterThanOrEqualTo(y.abs().times(QUOTIENT_LIMIT));
	}

	/**
	 * Raises to an arbitrary decimal exponent. Negative bases with fractional
	 * exponents give NaN; zero to a negative power gives Infinity.
	 */
	pow(exponent: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.toPower(exponent.raw));
	}

	/**
	 * Fused multiply-add `this × a + b`. The product is exact, so the only
	 * rounding happens on the final sum.
	 */
	mulAdd(a: LibDecimal, b: LibDecimal): LibDecimal {
		const product = new Wide(this.raw).times(a.raw);
		return new LibDecimal(new Primitive(product).plus(b.raw));
	}

	neg(): LibDecimal {
		return new LibDecimal(this.raw.negated());
	}

	abs(): LibDecimal {
		return new LibDecimal(this.raw.absoluteValue());
	}

	max(other: LibDecimal): LibDecimal {
		return this.raw.greaterThanOrEqualTo(other.raw) ? this : other;
	}

	min(other: LibDecimal): LibDecimal {
		return this.raw.lessThanOrEqualTo(other.raw) ? this : other;
	}

	// ── Comparison ─────────────────────────────────────────────────

	/**
	 * Numeric comparison. Returns undefined when either side is NaN.
	 * @example a.partialCmp(b) // -1, 0, 1 or undefined
	 */
	partialCmp(other: LibDecimal): -1 | 0 | 1 | undefined {
		const c = this.raw.comparedTo(other.raw);
		if (c < 0) return -1;
		if (c > 0) return 1;
		return c === 0 ? 0 : undefined;
	}

	eq(other: LibDecimal): boolean {
		return this.raw.equals(other.raw);
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Default formatting: plain notation for exponents between -7 and 21,
	 * exponential notation outside, no trailing zeros, `-0` printed as `0`.
	 * @example LibDecimal.parse("1.500")?.toString() // "1.5"
	 */
	toString(): string {
		return this.raw.isZero() ? "0" : this.raw.toString();
	}

	/**
	 * Key shared by every spelling of the same number. decimal.js drops
	 * trailing zeros on input, so the canonical text already is one.
	 */
	hashKey(): string {
		return this.toString();
	}

	/**
	 * Fixed-point text with the given number of decimal places (half to even).
	 * @example LibDecimal.parse("1.23456")?.toFixed(2) // "1.23"
	 */
	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	toExponential(places?: number): string {
		return this.raw.toExponential(places);
	}

	/** Converts to a JavaScript number. May lose precision. */
	toNumber(): number {
		return this.raw.toNumber();
	}
}
