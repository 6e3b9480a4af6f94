/**
 * Library configuration.
 *
 * Defaults suit interactive use. Environment variables override them via
 * `configFromEnv`, and explicit options override both via `resolveConfig`.
 */

import type { LogLevel } from "../lib/logger/index.js";
import { LOG_LEVELS } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";

export interface BinomialConfig {
	/** Level of the logger a distribution builds when none is passed */
	readonly logLevel: LogLevel;
	/** Decimal places used by the distribution table and stats lines */
	readonly displayPrecision: number;
	/** Significant digits for the exact (decimal) probability path */
	readonly decimalPrecision: number;
}

export const DEFAULT_CONFIG: BinomialConfig = {
	logLevel: "warn",
	displayPrecision: 4,
	decimalPrecision: 40,
};

const MAX_DISPLAY_PRECISION = 20;

const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

interface MutableConfig {
	logLevel?: LogLevel;
	displayPrecision?: number;
	decimalPrecision?: number;
}

/**
 * Reads config values from environment variables.
 * Supported: BINOMIAL_LOG_LEVEL, BINOMIAL_DISPLAY_PRECISION, BINOMIAL_DECIMAL_PRECISION.
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<BinomialConfig> {
	const result: MutableConfig = {};

	const rawLevel = env.BINOMIAL_LOG_LEVEL;
	if (rawLevel) {
		const level = validate(logLevelSchema, rawLevel.trim().toLowerCase());
		if (!level.ok) {
			throw new ConfigError(
				`Invalid BINOMIAL_LOG_LEVEL: "${rawLevel}" must be one of ${LOG_LEVELS.join(", ")}`,
				{ cause: level.error },
			);
		}
		result.logLevel = level.value;
	}

	const display = parseIntEnv(env, "BINOMIAL_DISPLAY_PRECISION", 0);
	if (display !== undefined) {
		if (display > MAX_DISPLAY_PRECISION) {
			throw new ConfigError(
				`Invalid BINOMIAL_DISPLAY_PRECISION: "${display}" must be at most ${MAX_DISPLAY_PRECISION}`,
			);
		}
		result.displayPrecision = display;
	}

	const decimal = parseIntEnv(env, "BINOMIAL_DECIMAL_PRECISION", 1);
	if (decimal !== undefined) {
		result.decimalPrecision = decimal;
	}

	return result;
}

/**
 * Merge explicit overrides over the defaults.
 * @throws ConfigError if a precision is out of range
 */
export function resolveConfig(overrides: Partial<BinomialConfig> = {}): BinomialConfig {
	const config = { ...DEFAULT_CONFIG, ...overrides };
	const { displayPrecision, decimalPrecision } = config;
	if (
		!Number.isInteger(displayPrecision) ||
		displayPrecision < 0 ||
		displayPrecision > MAX_DISPLAY_PRECISION
	) {
		throw new ConfigError(
			`displayPrecision must be an integer between 0 and ${MAX_DISPLAY_PRECISION}`,
			{ displayPrecision },
		);
	}
	if (!Number.isInteger(decimalPrecision) || decimalPrecision < 1) {
		throw new ConfigError("decimalPrecision must be a positive integer", { decimalPrecision });
	}
	return config;
}

function strictParseInt(raw: string): number {
	const parsed = Number.parseInt(raw, 10);
	if (Number.isNaN(parsed) || String(parsed) !== raw.trim()) {
		return Number.NaN;
	}
	return parsed;
}

function parseIntEnv(env: NodeJS.ProcessEnv, envKey: string, min: number): number | undefined {
	const raw = env[envKey];
	if (!raw) return undefined;
	const parsed = strictParseInt(raw);
	if (Number.isNaN(parsed) || parsed < min) {
		const expected = min === 0 ? "a non-negative integer" : `an integer >= ${min}`;
		throw new ConfigError(`Invalid ${envKey}: "${raw}" must be ${expected}`);
	}
	return parsed;
}
