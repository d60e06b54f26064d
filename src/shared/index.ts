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
	tryCatch,
} from "./result.js";

export {
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
} from "./errors.js";

export { Decimal, type DecimalParseError, type Ordering } from "./decimal.js";
export { DecimalAccumulator, sum } from "./accumulate.js";
export { DecimalMap } from "./decimal-map.js";
export { type DecimalConfig, DEFAULT_DECIMAL_CONFIG, configFromEnv, loadConfig } from "./config.js";
export { getLogger, setLogger, resetLogger } from "./log.js";
