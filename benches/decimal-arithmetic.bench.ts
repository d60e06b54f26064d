import { bench, describe } from "vitest";
import { deserializeDecimal } from "../src/serde/deserialize.js";
import { sum } from "../src/shared/accumulate.js";
import { DecimalMap } from "../src/shared/decimal-map.js";
import { Decimal } from "../src/shared/decimal.js";
import { dec } from "../src/testing/literal.js";

function generateAmounts(n: number): Decimal[] {
	const amounts: Decimal[] = [];
	for (let i = 0; i < n; i++) {
		amounts.push(dec(`${(i * 7919) % 100000}e-2`));
	}
	return amounts;
}

const amounts1k = generateAmounts(1000);

describe("arithmetic", () => {
	bench("sum 1000 amounts", () => {
		sum(amounts1k);
	});

	bench("mulAdd 1000x", () => {
		const rate = dec("1.0125");
		let acc = Decimal.zero();
		for (const amount of amounts1k) {
			acc = amount.mulAdd(rate, acc);
		}
	});

	bench("div 1000x", () => {
		const divisor = dec("3");
		for (const amount of amounts1k) {
			amount.div(divisor);
		}
	});
});

describe("parsing and hashing", () => {
	bench("parse 1000 literals", () => {
		for (let i = 0; i < 1000; i++) {
			Decimal.parse("12345.6789");
		}
	});

	bench("deserialize 1000 JSON numbers", () => {
		for (let i = 0; i < 1000; i++) {
			deserializeDecimal(1234.56);
		}
	});

	bench("DecimalMap insert 1000 keys", () => {
		const map = new DecimalMap<number>();
		for (const [i, amount] of amounts1k.entries()) {
			map.set(amount, i);
		}
	});
});
