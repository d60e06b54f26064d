/**
 * Validation wrapper — thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Re-exports `z` so schemas (the decimal field schema included) are built
 * against the same zod instance this package validates with.
 */

import { z } from "zod";
import { DecimalError, ErrorCategory } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Recoverable error containing one or more validation issues. */
export class ValidationError extends DecimalError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[], cause?: unknown) {
		super(message, "VALIDATION_FAILED", ErrorCategory.Recoverable, {
			issueCount: issues.length,
		});
		this.name = "ValidationError";
		this.issues = issues;
		if (cause !== undefined) this.cause = cause;
	}

	/** Issues joined as `path: message` lines, for log output. */
	describe(): string {
		return this.issues
			.map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
			.join("\n");
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path.filter((p): p is string | number => typeof p !== "symbol"),
		message: i.message,
	}));
	return err(new ValidationError("Validation failed", issues, result.error));
}
