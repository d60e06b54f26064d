/**
 * Package configuration.
 *
 * Only ambient concerns are configurable. Precision, rounding and the exponent
 * range belong to the decimal primitive and are fixed.
 */

import { LOG_LEVELS, type LogLevel } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";

export interface DecimalConfig {
	/** Minimum level written by the package logger */
	readonly logLevel: LogLevel;
	/** `name` field stamped on every log line */
	readonly loggerName: string;
}

export const DEFAULT_DECIMAL_CONFIG: DecimalConfig = {
	logLevel: "warn",
	loggerName: "exact-decimal",
};

const envSchema = z.object({
	EXACT_DECIMAL_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
	EXACT_DECIMAL_LOGGER_NAME: z.string().trim().min(1).optional(),
});

/** Mutable builder shape for constructing Partial<DecimalConfig>. */
interface MutableDecimalConfig {
	logLevel?: LogLevel;
	loggerName?: string;
}

/**
 * Reads config values from environment variables.
 * Supported: EXACT_DECIMAL_LOG_LEVEL, EXACT_DECIMAL_LOGGER_NAME.
 * Empty variables count as unset.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<DecimalConfig> {
	const raw = {
		// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
		EXACT_DECIMAL_LOG_LEVEL: env["EXACT_DECIMAL_LOG_LEVEL"] || undefined,
		// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
		EXACT_DECIMAL_LOGGER_NAME: env["EXACT_DECIMAL_LOGGER_NAME"] || undefined,
	};

	const parsed = validate(envSchema, raw);
	if (!parsed.ok) {
		const first = parsed.error.issues[0];
		const key = first?.path[0] ?? "environment";
		throw new ConfigError(`Invalid ${String(key)}: ${first?.message ?? "invalid value"}`, {
			cause: parsed.error,
		});
	}

	const result: MutableDecimalConfig = {};
	if (parsed.value.EXACT_DECIMAL_LOG_LEVEL !== undefined) {
		result.logLevel = parsed.value.EXACT_DECIMAL_LOG_LEVEL;
	}
	if (parsed.value.EXACT_DECIMAL_LOGGER_NAME !== undefined) {
		result.loggerName = parsed.value.EXACT_DECIMAL_LOGGER_NAME;
	}
	return result;
}

/** Defaults overlaid with whatever the environment sets. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): DecimalConfig {
	return { ...DEFAULT_DECIMAL_CONFIG, ...configFromEnv(env) };
}
