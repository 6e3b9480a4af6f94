/**
 * Logger wrapper: structured logging backed by pino.
 *
 * Library code depends on the `Logger` interface only; pino stays behind
 * this module.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe, plus `silent`. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
	"trace",
	"debug",
	"info",
	"warn",
	"error",
	"fatal",
	"silent",
];

export interface LoggerConfig {
	readonly level: LogLevel;
	/** Where serialized JSON lines go; stdout when omitted. */
	readonly destination?: pino.DestinationStream;
	/** Bindings attached to every line. */
	readonly base?: Record<string, unknown>;
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

// ── Factory ─────────────────────────────────────────────────────────

type EmitLevel = "info" | "warn" | "error" | "debug";

function emit(target: pino.Logger, level: EmitLevel, msgOrObj: unknown, msg?: string): void {
	if (typeof msgOrObj === "object" && msgOrObj !== null) {
		target[level](msgOrObj, msg ?? "");
	} else {
		target[level](String(msgOrObj ?? ""));
	}
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(bindings));
		},
	};
}

/**
 * Creates a Logger backed by pino.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug" });
 * const dist = new Binomial(10, 0.3, { logger });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = { level: config.level };
	if (config.base !== undefined) {
		pinoOptions.base = config.base;
	}

	const pinoLogger =
		config.destination !== undefined ? pino(pinoOptions, config.destination) : pino(pinoOptions);

	return wrapPino(pinoLogger);
}

const sharedLoggers = new Map<LogLevel, Logger>();

/** Process-wide stdout logger for a level, created on first use. */
export function sharedLogger(level: LogLevel): Logger {
	const cached = sharedLoggers.get(level);
	if (cached !== undefined) return cached;
	const logger = createLogger({ level });
	sharedLoggers.set(level, logger);
	return logger;
}

/** Logger that drops every line. */
export function silentLogger(): Logger {
	return createLogger({ level: "silent" });
}
