/**
 * DecimalError hierarchy — structured error classification.
 *
 * Recoverable errors travel through Result and describe bad input. Fatal errors
 * are thrown: they mean a broken invariant or unusable configuration, and no
 * caller can do anything sensible with them except stop.
 */

/** Severity categories. */
export const ErrorCategory = {
	Recoverable: "recoverable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing DecimalError subclasses with optional cause chain. */
interface DecimalErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & DecimalErrorOptions;

/** Base error class for every failure the package reports. */
export class DecimalError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "DecimalError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			fatal: this.isFatal,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Text does not match the decimal literal grammar. */
export class ParseError extends DecimalError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "PARSE_ERROR", ErrorCategory.Recoverable, rest);
		this.name = "ParseError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Text parsed, but denotes NaN or Infinity. */
export class NonFiniteError extends DecimalError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "NON_FINITE", ErrorCategory.Recoverable, rest);
		this.name = "NonFiniteError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A guarded operation (division, remainder, power) produced NaN or Infinity. */
export class NonFiniteResultError extends DecimalError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "NON_FINITE_RESULT", ErrorCategory.Recoverable, rest);
		this.name = "NonFiniteResultError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** An inbound string or float failed grammar or finiteness validation. */
export class InvalidValueError extends DecimalError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "INVALID_VALUE", ErrorCategory.Recoverable, rest);
		this.name = "InvalidValueError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** An inbound value had a shape that cannot become a Decimal. */
export class UnexpectedTypeError extends DecimalError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "UNEXPECTED_TYPE", ErrorCategory.Recoverable, rest);
		this.name = "UnexpectedTypeError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid configuration. */
export class ConfigError extends DecimalError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/**
 * Fatal error for a broken internal invariant, such as two finite values that
 * do not compare. Always a bug, never bad input.
 */
export class InvariantViolationError extends DecimalError {
	constructor(message: string, context: ErrorContext = {}) {
		const { cause, ...rest } = context;
		super(
			message,
			"INVARIANT_VIOLATION",
			ErrorCategory.Fatal,
			rest,
			"This is a bug in exact-decimal; please report it with the values involved",
		);
		this.name = "InvariantViolationError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Type guards ──────────────────────────────────────────────────────

export function isDecimalError(e: unknown): e is DecimalError {
	return e instanceof DecimalError;
}

export function isParseError(e: unknown): e is ParseError {
	return e instanceof ParseError;
}

export function isNonFiniteError(e: unknown): e is NonFiniteError {
	return e instanceof NonFiniteError;
}

export function isNonFiniteResultError(e: unknown): e is NonFiniteResultError {
	return e instanceof NonFiniteResultError;
}

export function isInvalidValueError(e: unknown): e is InvalidValueError {
	return e instanceof InvalidValueError;
}

export function isUnexpectedTypeError(e: unknown): e is UnexpectedTypeError {
	return e instanceof UnexpectedTypeError;
}

export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

export function isInvariantViolation(e: unknown): e is InvariantViolationError {
	return e instanceof InvariantViolationError;
}
