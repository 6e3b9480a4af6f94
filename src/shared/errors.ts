/**
 * BinomialError hierarchy: structured error classification.
 *
 * Every error carries a kind (type, domain, config). Validation failures
 * are never caught or retried inside the library; they surface to the caller
 * as one of these classes.
 */

/** Error kinds: wrong value type, value outside its domain, bad configuration. */
export const ErrorKind = {
	Type: "type",
	Domain: "domain",
	Config: "config",
} as const;

export type ErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind];

/** Base error class for every failure raised by the library. */
export class BinomialError extends Error {
	readonly kind: ErrorKind;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		kind: ErrorKind,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "BinomialError";
		this.kind = kind;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			kind: this.kind,
			...(this.hint !== undefined && { hint: this.hint }),
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** A value expected to be an integer (or a number) had another type. */
export class InvalidTypeError extends BinomialError {
	constructor(message: string, context: Record<string, unknown> = {}, hint?: string) {
		super(message, "INVALID_TYPE", ErrorKind.Type, context, hint);
		this.name = "InvalidTypeError";
	}
}

/** A well-typed value fell outside its domain: negative, out of order or out of [0, 1]. */
export class DomainError extends BinomialError {
	constructor(message: string, context: Record<string, unknown> = {}, hint?: string) {
		super(message, "OUT_OF_DOMAIN", ErrorKind.Domain, context, hint);
		this.name = "DomainError";
	}
}

/** Invalid or unreadable configuration. */
export class ConfigError extends BinomialError {
	constructor(message: string, context: Record<string, unknown> = {}) {
		super(message, "CONFIG_ERROR", ErrorKind.Config, context);
		this.name = "ConfigError";
	}
}

// ── Type guards ──────────────────────────────────────────────────────

export function isBinomialError(e: unknown): e is BinomialError {
	return e instanceof BinomialError;
}

export function isInvalidTypeError(e: unknown): e is InvalidTypeError {
	return e instanceof InvalidTypeError;
}

export function isDomainError(e: unknown): e is DomainError {
	return e instanceof DomainError;
}

export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}

/** Render any thrown value as a short description for messages and logs. */
export function describeValue(value: unknown): string {
	if (typeof value === "string") return JSON.stringify(value);
	if (typeof value === "bigint") return `${value}n`;
	if (typeof value === "object" && value !== null) {
		return Array.isArray(value) ? "array" : "object";
	}
	return String(value);
}
