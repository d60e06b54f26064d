import type { Decimal } from "../shared/decimal.js";

/**
 * Outbound form of a Decimal: its canonical string. Emitting a string rather
 * than a number keeps consumers from re-reading the value as a binary float.
 * @example serializeDecimal(price) // "1.234"
 */
export function serializeDecimal(value: Decimal): string {
	return value.toString();
}

/**
 * JSON text in which every Decimal appears as a quoted canonical string
 * (through `Decimal.toJSON`).
 * @example stringifyJson({ amount }) // '{"amount":"1.234"}'
 */
export function stringifyJson(value: unknown, space?: number): string {
	return JSON.stringify(value, null, space);
}
