import { ValidationError, validate, z } from "../lib/validation/index.js";
import type { Decimal } from "../shared/decimal.js";
import { type Result, err, tryCatch } from "../shared/result.js";
import { deserializeDecimal } from "./deserialize.js";

/**
 * Zod schema for a decimal field. Accepts every shape
 * {@link deserializeDecimal} accepts and outputs a Decimal.
 *
 * @example
 * ```ts
 * const Payment = z.object({ amount: decimalSchema, memo: z.string() });
 * parseJson('{"amount":"12.50","memo":"rent"}', Payment);
 * ```
 */
export const decimalSchema: z.ZodType<Decimal, z.ZodTypeDef, unknown> = z
	.unknown()
	.transform((value, ctx) => {
		const decoded = deserializeDecimal(value);
		if (decoded.ok) return decoded.value;
		ctx.addIssue({ code: "custom", message: decoded.error.message });
		return z.NEVER;
	});

/**
 * Parses JSON text and validates it against a schema. Malformed JSON and
 * schema mismatches both come back as a ValidationError.
 */
export function parseJson<T>(
	text: string,
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Result<T, ValidationError> {
	const data = tryCatch((): unknown => JSON.parse(text));
	if (!data.ok) {
		return err(
			new ValidationError("Malformed JSON", [{ path: [], message: data.error.message }], data.error),
		);
	}
	return validate(schema, data.value);
}
