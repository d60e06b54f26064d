/**
 * Logger wrapper — domain-agnostic structured logging backed by pino.
 *
 * Supports path-based redaction and an injectable destination so callers can
 * capture output in tests or forward it to their own sink.
 */

import { pino } from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly name?: string;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

type LogMethod = "info" | "warn" | "error" | "debug";

// ── Factory ─────────────────────────────────────────────────────────

function forward(target: pino.Logger, method: LogMethod) {
	return (msgOrObj: unknown, msg?: string): void => {
		if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
			target[method](String(msgOrObj ?? ""));
		} else if (typeof msgOrObj === "object") {
			target[method](msgOrObj, msg ?? "");
		} else {
			target[method]({ value: msgOrObj }, msg ?? "");
		}
	};
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info: forward(pinoLogger, "info"),
		warn: forward(pinoLogger, "warn"),
		error: forward(pinoLogger, "error"),
		debug: forward(pinoLogger, "debug"),
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino with optional redaction and custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "info" });
 * logger.info({ value: "1.5" }, "parsed decimal");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.name !== undefined) {
		pinoOptions.name = config.name;
	}

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: "[REDACTED]",
		};
	}

	const destination = config.destination;
	if (destination) {
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		return wrapPino(pino(pinoOptions, stream));
	}

	return wrapPino(pino(pinoOptions));
}
