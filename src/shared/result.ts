/**
 * Result<T, E> for the non-throwing entry points (`Binomial.create`,
 * boundary parsing). The core functions throw; `attempt` bridges the two.
 */

import { BinomialError } from "./errors.js";

/** Discriminated union -- `ok: true` carries a value, `ok: false` carries an error. */
export type Result<T, E = BinomialError> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

// ── Factories ────────────────────────────────────────────────────────

export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

// ── Combinators ──────────────────────────────────────────────────────

/** Transform the success value of a Result, leaving errors untouched. */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
	return result.ok ? ok(fn(result.value)) : result;
}

/** Chain a fallible operation on the success value; short-circuits on error. */
export function flatMap<T, U, E>(
	result: Result<T, E>,
	fn: (value: T) => Result<U, E>,
): Result<U, E> {
	return result.ok ? fn(result.value) : result;
}

/** Extract the success value or throw the error. Use at system boundaries only. */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	throw result.error instanceof Error ? result.error : new Error(String(result.error));
}

export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
	return result.ok ? result.value : fallback;
}

export function isOk<T, E>(
	result: Result<T, E>,
): result is { readonly ok: true; readonly value: T } {
	return result.ok;
}

export function isErr<T, E>(
	result: Result<T, E>,
): result is { readonly ok: false; readonly error: E } {
	return !result.ok;
}

// ── Throwing → Result bridge ─────────────────────────────────────────

/**
 * Run a throwing computation and capture a BinomialError as `err`.
 * Anything that is not a BinomialError is a bug and is rethrown.
 */
export function attempt<T>(fn: () => T): Result<T, BinomialError> {
	try {
		return ok(fn());
	} catch (e) {
		if (e instanceof BinomialError) return err(e);
		throw e;
	}
}
