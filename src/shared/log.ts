import { type Logger, createLogger } from "../lib/logger/index.js";
import { DEFAULT_DECIMAL_CONFIG, type DecimalConfig, loadConfig } from "./config.js";
import { type ConfigError, isConfigError } from "./errors.js";

let active: Logger | undefined;

/**
 * Package logger, created on first use from {@link loadConfig}. Host
 * applications replace it with {@link setLogger} to route output into their own
 * pino instance or silence it.
 *
 * An invalid logging environment never escapes from here: the logger falls
 * back to {@link DEFAULT_DECIMAL_CONFIG} and reports the rejected setting as a
 * warning, so a rejected input still comes back as a Result.
 */
export function getLogger(): Logger {
	if (active === undefined) {
		let config: DecimalConfig = DEFAULT_DECIMAL_CONFIG;
		let rejected: ConfigError | undefined;
		try {
			config = loadConfig();
		} catch (e) {
			if (!isConfigError(e)) throw e;
			rejected = e;
		}
		active = createLogger({ level: config.logLevel, name: config.loggerName });
		if (rejected !== undefined) {
			active.warn(rejected.toJSON(), "invalid logging configuration, using defaults");
		}
	}
	return active;
}

export function setLogger(logger: Logger): void {
	active = logger;
}

/** Drops the current logger so the next {@link getLogger} call rebuilds it from config. */
export function resetLogger(): void {
	active = undefined;
}
