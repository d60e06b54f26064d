import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { type Logger, createLogger } from "../lib/logger/index.js";
import { dec } from "../testing/literal.js";
import { Decimal, totalOrdering } from "./decimal.js";
import {
	InvariantViolationError,
	NonFiniteError,
	NonFiniteResultError,
	ParseError,
} from "./errors.js";
import { resetLogger, setLogger } from "./log.js";

function captureLogs(): string[] {
	const captured: string[] = [];
	const logger: Logger = createLogger({
		level: "debug",
		destination: {
			write(msg: string) {
				captured.push(msg);
			},
		},
	});
	setLogger(logger);
	return captured;
}

describe("Decimal", () => {
	afterEach(() => {
		resetLogger();
	});

	describe("zero", () => {
		it("is the additive identity", () => {
			expect(Decimal.zero().isZero()).toBe(true);
			expect(Decimal.zero().toString()).toBe("0");
			expect(dec("12.5").add(Decimal.zero()).eq(dec("12.5"))).toBe(true);
		});

		it("equals every spelling of zero", () => {
			expect(Decimal.zero().eq(dec("0.0"))).toBe(true);
			expect(Decimal.zero().eq(dec("-0"))).toBe(true);
			expect(Decimal.zero().eq(dec("0e10"))).toBe(true);
		});

		it("one is the multiplicative identity", () => {
			expect(Decimal.one().toString()).toBe("1");
			expect(dec("7.25").mul(Decimal.one()).toString()).toBe("7.25");
		});
	});

	describe("parse", () => {
		it("parses decimal literals", () => {
			const r = Decimal.parse("-12.50e3");
			expect(r.ok).toBe(true);
			if (r.ok) expect(r.value.toString()).toBe("-12500");
		});

		it("reports grammar failures as ParseError", () => {
			const r = Decimal.parse("12,5");
			expect(r.ok).toBe(false);
			if (!r.ok) {
				expect(r.error).toBeInstanceOf(ParseError);
				expect(r.error.message).toBe('Failed to parse "12,5" as a decimal');
				expect(r.error.context).toEqual({ input: "12,5" });
			}
		});

		it("rejects the empty string", () => {
			const r = Decimal.parse("");
			expect(r.ok).toBe(false);
			if (!r.ok) expect(r.error.code).toBe("PARSE_ERROR");
		});

		it.each(["NaN", "nan", "-NaN", "sNaN"])("rejects %s as NaN", (text) => {
			const r = Decimal.parse(text);
			expect(r.ok).toBe(false);
			if (!r.ok) {
				expect(r.error).toBeInstanceOf(NonFiniteError);
				expect(r.error.message).toBe("NaN is not supported");
			}
		});

		it.each(["inf", "Infinity", "-Infinity", "+INF", "1e99999999999999999"])(
			"rejects %s as Infinity",
			(text) => {
				const r = Decimal.parse(text);
				expect(r.ok).toBe(false);
				if (!r.ok) {
					expect(r.error).toBeInstanceOf(NonFiniteError);
					expect(r.error.message).toBe("Infinity is not supported");
				}
			},
		);

		it("reports exactly one reason per failure", () => {
			const grammar = Decimal.parse("nope");
			const finiteness = Decimal.parse("nan");
			expect(!grammar.ok && grammar.error.code).toBe("PARSE_ERROR");
			expect(!finiteness.ok && finiteness.error.code).toBe("NON_FINITE");
		});
	});

	describe("fromInteger", () => {
		it("converts numbers and bigints exactly", () => {
			expect(Decimal.fromInteger(42).toString()).toBe("42");
			expect(Decimal.fromInteger(-2147483648).toString()).toBe("-2147483648");
			expect(Decimal.fromInteger(4294967295).toString()).toBe("4294967295");
			expect(Decimal.fromInteger(Number.MAX_SAFE_INTEGER).toString()).toBe("9007199254740991");
		});

		it("covers the full 64-bit signed and unsigned span", () => {
			expect(Decimal.fromInteger(-9223372036854775808n).toString()).toBe("-9223372036854775808");
			expect(Decimal.fromInteger(9223372036854775807n).toString()).toBe("9223372036854775807");
			expect(Decimal.fromInteger(18446744073709551615n).toString()).toBe("18446744073709551615");
		});

		it("treats a non-integer or out-of-range argument as a caller bug", () => {
			expect(() => Decimal.fromInteger(1.5)).toThrow(RangeError);
			expect(() => Decimal.fromInteger(Number.NaN)).toThrow("is not a safe integer");
			expect(() => Decimal.fromInteger(2n ** 64n)).toThrow("outside the 64-bit integer range");
			expect(() => Decimal.fromInteger(-(2n ** 63n) - 1n)).toThrow(RangeError);
		});
	});

	describe("fromNumber", () => {
		it("keeps the decimal digits a float prints with", () => {
			const r = Decimal.fromNumber(0.1);
			expect(r.ok && r.value.eq(dec("0.1"))).toBe(true);
			const big = Decimal.fromNumber(1e21);
			expect(big.ok && big.value.toString()).toBe("1e+21");
		});

		it("rejects NaN and the infinities", () => {
			const nan = Decimal.fromNumber(Number.NaN);
			const inf = Decimal.fromNumber(Number.NEGATIVE_INFINITY);
			expect(!nan.ok && nan.error.message).toBe("NaN is not supported");
			expect(!inf.ok && inf.error.message).toBe("Infinity is not supported");
		});
	});

	describe("total arithmetic", () => {
		it("1.11 + 2.22 is exactly 3.33", () => {
			const a = dec("1.11");
			const b = dec("2.22");
			expect(a.add(b).eq(dec("3.33"))).toBe(true);
			expect(a.add(b).toString()).toBe("3.33");
			// operands are untouched
			expect(a.toString()).toBe("1.11");
			expect(b.toString()).toBe("2.22");
		});

		it("subtracts and multiplies", () => {
			expect(dec("1").sub(dec("1.5")).toString()).toBe("-0.5");
			expect(dec("0.1").mul(dec("0.2")).toString()).toBe("0.02");
		});

		it("negates", () => {
			expect(dec("1.1").neg().eq(dec("-1.1"))).toBe(true);
			expect(dec("-3").neg().toString()).toBe("3");
		});

		it("abs", () => {
			expect(dec("-5").abs().toString()).toBe("5");
			expect(dec("5").abs().toString()).toBe("5");
		});

		it("min and max", () => {
			expect(dec("1.1").min(dec("2.2")).eq(dec("1.1"))).toBe(true);
			expect(dec("1.1").max(dec("2.2")).eq(dec("2.2"))).toBe(true);
			expect(dec("-1").max(dec("-2")).toString()).toBe("-1");
		});

		it("mulAdd computes this * a + b", () => {
			expect(dec("4").mulAdd(dec("2"), dec("3")).toString()).toBe("11");
			expect(dec("0.5").mulAdd(dec("0.5"), dec("-0.25")).isZero()).toBe(true);
		});

		it("leaving the exponent range is an invariant violation", () => {
			const captured = captureLogs();
			const huge = dec("1e8000000000000000");
			expect(() => huge.mul(huge)).toThrow(InvariantViolationError);
			expect(() => huge.mul(huge)).toThrow("mul left the finite decimal range");
			expect(captured.join("")).toContain("INVARIANT_VIOLATION");
		});
	});

	describe("guarded arithmetic", () => {
		it("divides by a non-zero divisor", () => {
			const r = dec("10").div(dec("4"));
			expect(r.ok && r.value.toString()).toBe("2.5");
			const third = dec("1").div(dec("3"));
			expect(third.ok && third.value.toFixed(6)).toBe("0.333333");
		});

		it("fails on division by zero", () => {
			const r = dec("1").div(Decimal.zero());
			expect(r.ok).toBe(false);
			if (!r.ok) {
				expect(r.error).toBeInstanceOf(NonFiniteResultError);
				expect(r.error.message).toBe("Only finite values are supported: 1 / 0 produced Infinity");
				expect(r.error.context).toEqual({ expression: "1 / 0", result: "Infinity" });
			}
		});

		it("fails on 0 / 0 with NaN", () => {
			const r = Decimal.zero().div(Decimal.zero());
			expect(!r.ok && r.error.message).toBe(
				"Only finite values are supported: 0 / 0 produced NaN",
			);
		});

		it("remainder keeps the sign of the dividend", () => {
			const r = dec("-7").rem(dec("3"));
			expect(r.ok && r.value.toString()).toBe("-1");
			const frac = dec("5.5").rem(dec("2"));
			expect(frac.ok && frac.value.toString()).toBe("1.5");
		});

		it("fails on remainder by zero", () => {
			const r = dec("5").rem(Decimal.zero());
			expect(!r.ok && r.error.code).toBe("NON_FINITE_RESULT");
			expect(!r.ok && r.error.message).toBe("Only finite values are supported: 5 % 0 produced NaN");
		});

		it("fails when the integer quotient exceeds the precision", () => {
			const r = dec("1e40").rem(dec("7"));
			expect(r.ok).toBe(false);
			if (!r.ok) {
				expect(r.error.code).toBe("NON_FINITE_RESULT");
				expect(r.error.message).toBe(
					"Only finite values are supported: 1e+40 % 7 produced NaN",
				);
			}
			const far = dec("1e3000000").rem(dec("7"));
			expect(!far.ok && far.error.code).toBe("NON_FINITE_RESULT");
		});

		it("keeps remainders whose quotient fits the precision", () => {
			const r = dec("2e34").rem(dec("3"));
			expect(r.ok && r.value.toString()).toBe("2");
		});

		it("raises to a power", () => {
			const r = dec("2").pow(dec("10"));
			expect(r.ok && r.value.toString()).toBe("1024");
			const inverse = dec("2").pow(dec("-2"));
			expect(inverse.ok && inverse.value.toString()).toBe("0.25");
		});

		it("fails on powers with no finite result", () => {
			const zeroInverse = Decimal.zero().pow(dec("-1"));
			expect(!zeroInverse.ok && zeroInverse.error.message).toBe(
				"Only finite values are supported: 0 ^ -1 produced Infinity",
			);
			const negativeRoot = dec("-8").pow(dec("0.5"));
			expect(!negativeRoot.ok && negativeRoot.error.code).toBe("NON_FINITE_RESULT");
		});
	});

	describe("predicates", () => {
		it("isZero", () => {
			expect(dec("0.000").isZero()).toBe(true);
			expect(dec("0.001").isZero()).toBe(false);
		});

		it("isNegative is strictly below zero", () => {
			expect(dec("-0.1").isNegative()).toBe(true);
			expect(dec("-0").isNegative()).toBe(false);
			expect(dec("0.1").isNegative()).toBe(false);
		});

		it("isPositive", () => {
			expect(dec("0.1").isPositive()).toBe(true);
			expect(Decimal.zero().isPositive()).toBe(false);
		});

		it("isDecimal", () => {
			expect(Decimal.isDecimal(dec("1"))).toBe(true);
			expect(Decimal.isDecimal("1")).toBe(false);
			expect(Decimal.isDecimal(1)).toBe(false);
		});
	});

	describe("equality and ordering", () => {
		it("equality is numeric, not textual", () => {
			expect(dec("1.0").eq(dec("1.00"))).toBe(true);
			expect(dec("1.0").eq(dec("1"))).toBe(true);
			expect(dec("1.0").eq(dec("1.1"))).toBe(false);
			expect(dec("100").eq(dec("1e2"))).toBe(true);
		});

		it("cmp orders values", () => {
			expect(dec("1.5").cmp(dec("2.5"))).toBe(-1);
			expect(dec("2.50").cmp(dec("2.5"))).toBe(0);
			expect(dec("3").cmp(dec("-3"))).toBe(1);
		});

		it("partialCmp agrees with cmp for finite values", () => {
			expect(dec("1.5").partialCmp(dec("2.5"))).toBe(-1);
			expect(dec("2.5").partialCmp(dec("2.50"))).toBe(0);
		});

		it("relational helpers", () => {
			const a = dec("1.5");
			const b = dec("2.5");
			expect(a.lt(b)).toBe(true);
			expect(b.gt(a)).toBe(true);
			expect(a.lte(dec("1.50"))).toBe(true);
			expect(b.gte(a)).toBe(true);
			expect(a.gt(b)).toBe(false);
		});

		it("compare sorts ascending", () => {
			const sorted = [dec("3"), dec("-1.5"), dec("0"), dec("2.25")].sort(Decimal.compare);
			expect(sorted.map((d) => d.toString())).toEqual(["-1.5", "0", "2.25", "3"]);
		});

		it("an incomparable pair is an invariant violation, not a result", () => {
			const captured = captureLogs();
			expect(totalOrdering(-1, "1", "2")).toBe(-1);
			expect(() => totalOrdering(undefined, "NaN", "1")).toThrow(InvariantViolationError);
			expect(() => totalOrdering(undefined, "NaN", "1")).toThrow(
				"Ordering not possible between NaN and 1",
			);
			expect(captured.length).toBe(2);
			expect(captured[0]).toContain('"code":"INVARIANT_VIOLATION"');
		});
	});

	describe("hashing", () => {
		it("equal values share hash keys and hash codes", () => {
			const spellings = ["1", "1.0", "1.00", "10e-1", "0.1e1"].map(dec);
			for (const d of spellings) {
				expect(d.hashKey()).toBe("1");
				expect(d.hashCode()).toBe(spellings[0]?.hashCode());
			}
		});

		it("negative zero hashes like zero", () => {
			expect(dec("-0").hashCode()).toBe(Decimal.zero().hashCode());
		});

		it("hash codes are unsigned 32-bit integers", () => {
			const code = dec("-123.456").hashCode();
			expect(Number.isInteger(code)).toBe(true);
			expect(code).toBeGreaterThanOrEqual(0);
			expect(code).toBeLessThan(2 ** 32);
		});

		it("different values get different keys", () => {
			expect(dec("1.0").hashKey()).not.toBe(dec("1.1").hashKey());
		});
	});

	describe("conversion", () => {
		it("toString is the canonical text", () => {
			expect(dec("1.500").toString()).toBe("1.5");
			expect(dec("-0").toString()).toBe("0");
			expect(dec("0.0000001").toString()).toBe("1e-7");
		});

		it("toJSON emits the canonical string", () => {
			expect(JSON.stringify({ amount: dec("1.234") })).toBe('{"amount":"1.234"}');
			expect(JSON.stringify([dec("2.50")])).toBe('["2.5"]');
		});

		it("toFixed and toExponential", () => {
			expect(dec("1.23456").toFixed(2)).toBe("1.23");
			expect(dec("1.2").toFixed(4)).toBe("1.2000");
			expect(dec("1234.5").toExponential(2)).toBe("1.23e+3");
		});

		it("toNumber for simple values", () => {
			expect(dec("1.5").toNumber()).toBe(1.5);
			expect(dec("-42").toNumber()).toBe(-42);
		});
	});

	describe("financial precision", () => {
		it("0.1 + 0.2 === 0.3 (unlike native floats)", () => {
			expect(dec("0.1").add(dec("0.2")).eq(dec("0.3"))).toBe(true);
		});

		it("handles very small values", () => {
			const tiny = dec("0.000000000000000001");
			expect(tiny.isPositive()).toBe(true);
			expect(tiny.add(tiny).toString()).toBe("2e-18");
		});
	});
});

describe("logging", () => {
	beforeEach(() => {
		resetLogger();
	});

	it("guarded failures do not log", () => {
		const captured = captureLogs();
		dec("1").div(Decimal.zero());
		Decimal.parse("bad");
		expect(captured).toEqual([]);
		resetLogger();
	});
});
