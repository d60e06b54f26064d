/**
 * Inbound decoding of structured values into Decimal.
 *
 * Accepted shapes:
 * - string: parsed as a decimal literal
 * - number: safe integers convert exactly; other floats go through their
 *   default text form and are re-parsed
 * - bigint: exact when it fits 64 bits, otherwise parsed from its digits
 *
 * Anything else is an UnexpectedTypeError. Every failure names what was
 * expected: "a Decimal value".
 */

import { Decimal } from "../shared/decimal.js";
import { InvalidValueError, UnexpectedTypeError } from "../shared/errors.js";
import { getLogger } from "../shared/log.js";
import { type Result, err, ok } from "../shared/result.js";

export const EXPECTING = "a Decimal value";

const I64_MIN = -(2n ** 63n);
const U64_MAX = 2n ** 64n - 1n;

export type DeserializeError = InvalidValueError | UnexpectedTypeError;

/** Human-readable description of an inbound value's shape. */
export function describeShape(value: unknown): string {
	if (value === null) return "null";
	if (Array.isArray(value)) return "sequence";
	switch (typeof value) {
		case "string":
			return `string ${JSON.stringify(value)}`;
		case "number":
			return Number.isInteger(value) ? `integer \`${value}\`` : `floating point \`${value}\``;
		case "bigint":
			return `integer \`${value}\``;
		case "boolean":
			return `boolean \`${value}\``;
		case "undefined":
			return "undefined";
		case "symbol":
			return "symbol";
		case "function":
			return "function";
		default:
			return "map";
	}
}

function rejected<E extends DeserializeError>(error: E, value: unknown): Result<never, E> {
	getLogger().debug({ code: error.code, shape: describeShape(value) }, "rejected inbound decimal");
	return err(error);
}

function visitString(value: string): Result<Decimal, InvalidValueError> {
	const parsed = Decimal.parse(value);
	if (parsed.ok) return parsed;
	return rejected(
		new InvalidValueError(`invalid value: ${describeShape(value)}, expected ${EXPECTING}`, {
			input: value,
			cause: parsed.error,
		}),
		value,
	);
}

function visitNumber(value: number): Result<Decimal, InvalidValueError> {
	if (Number.isSafeInteger(value)) {
		return ok(Decimal.fromInteger(value));
	}
	const parsed = Decimal.fromNumber(value);
	if (parsed.ok) return parsed;
	return rejected(
		new InvalidValueError(`invalid value: ${describeShape(value)}, expected ${EXPECTING}`, {
			input: String(value),
			cause: parsed.error,
		}),
		value,
	);
}

function visitBigInt(value: bigint): Result<Decimal, InvalidValueError> {
	if (value >= I64_MIN && value <= U64_MAX) {
		return ok(Decimal.fromInteger(value));
	}
	return visitString(value.toString());
}

/**
 * Decodes one structured value.
 * @example deserializeDecimal("1234") // ok(1234)
 * @example deserializeDecimal(1234.5) // ok(1234.5)
 * @example deserializeDecimal(true) // err(UnexpectedTypeError)
 */
export function deserializeDecimal(value: unknown): Result<Decimal, DeserializeError> {
	switch (typeof value) {
		case "string":
			return visitString(value);
		case "number":
			return visitNumber(value);
		case "bigint":
			return visitBigInt(value);
		default:
			return rejected(
				new UnexpectedTypeError(`invalid type: ${describeShape(value)}, expected ${EXPECTING}`, {
					shape: describeShape(value),
				}),
				value,
			);
	}
}
