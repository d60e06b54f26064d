// ── Value type ───────────────────────────────────────────────────────
export {
	Decimal,
	type DecimalParseError,
	type Ordering,
	DecimalAccumulator,
	sum,
	DecimalMap,
} from "./shared/index.js";

// ── Results & errors ─────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	map,
	mapErr,
	flatMap,
	unwrap,
	expect,
	unwrapOr,
	isOk,
	isErr,
	ErrorCategory,
	DecimalError,
	ParseError,
	NonFiniteError,
	NonFiniteResultError,
	InvalidValueError,
	UnexpectedTypeError,
	ConfigError,
	InvariantViolationError,
	isDecimalError,
	isParseError,
	isNonFiniteError,
	isNonFiniteResultError,
	isInvalidValueError,
	isUnexpectedTypeError,
	isConfigError,
	isInvariantViolation,
} from "./shared/index.js";

// ── Serialization ────────────────────────────────────────────────────
export {
	serializeDecimal,
	stringifyJson,
	deserializeDecimal,
	describeShape,
	type DeserializeError,
	EXPECTING,
	decimalSchema,
	parseJson,
} from "./serde/index.js";
export { ValidationError, type ValidationIssue, z } from "./lib/validation/index.js";

// ── Configuration & logging ──────────────────────────────────────────
export {
	type DecimalConfig,
	DEFAULT_DECIMAL_CONFIG,
	configFromEnv,
	loadConfig,
	getLogger,
	setLogger,
	resetLogger,
} from "./shared/index.js";
export { type Logger, type LoggerConfig, type LogLevel, createLogger } from "./lib/logger/index.js";
