/**
 * Example: read a JSON ledger, total it per account, write it back.
 *
 * Run: npx tsx examples/ledger.ts
 */

import {
	DecimalAccumulator,
	type Decimal,
	createLogger,
	decimalSchema,
	parseJson,
	stringifyJson,
	z,
} from "../src/index.js";

const logger = createLogger({ level: "info", name: "ledger-example" });

const Ledger = z.object({
	entries: z.array(z.object({ account: z.string(), amount: decimalSchema })),
});

const input = JSON.stringify({
	entries: [
		{ account: "cash", amount: "1.11" },
		{ account: "cash", amount: "2.22" },
		{ account: "fees", amount: -0.05 },
	],
});

const ledger = parseJson(input, Ledger);
if (!ledger.ok) {
	logger.error({ issues: ledger.error.describe() }, "ledger rejected");
	process.exitCode = 1;
} else {
	const totals = new Map<string, DecimalAccumulator>();
	for (const { account, amount } of ledger.value.entries) {
		const acc = totals.get(account) ?? new DecimalAccumulator();
		totals.set(account, acc.addAssign(amount));
	}

	const out: Record<string, Decimal> = {};
	for (const [account, acc] of totals) {
		out[account] = acc.value;
	}
	logger.info({ totals: stringifyJson(out) }, "ledger totals");
}
