/**
 * Guards for the integer arguments of every combinatorial and distribution
 * operation. Each check throws on the first failure and has no other effect.
 */

import { DomainError, InvalidTypeError, describeValue } from "../shared/errors.js";

/** Integer values accepted at the API boundary. */
export type IntegerLike = number | bigint;

/**
 * True for bigints and for numbers that hold an exact safe integer.
 * `1.5`, `NaN`, `Infinity` and numbers beyond ±2^53 - 1 are rejected, as is
 * every non-numeric value.
 */
export function isIntegerLike(x: unknown): x is IntegerLike {
	return typeof x === "bigint" || (typeof x === "number" && Number.isSafeInteger(x));
}

/**
 * @throws InvalidTypeError if `x` is not an integer value
 * @throws DomainError if `x` is negative
 */
export function validateNonNegativeInteger(x: unknown): asserts x is IntegerLike {
	if (!isIntegerLike(x)) {
		throw new InvalidTypeError(`${describeValue(x)} must be an integer`, {
			value: describeValue(x),
			type: typeof x,
		});
	}
	if (x < 0) {
		throw new DomainError(`${describeValue(x)} must be non-negative`, {
			value: describeValue(x),
		});
	}
}

/**
 * Validates `x`, then `y`, then `x <= y`. `hint` is attached to the error
 * raised for `x > y`.
 * @throws InvalidTypeError if either value is not an integer
 * @throws DomainError if either value is negative or `x > y`
 */
export function validateLessEqual(x: unknown, y: unknown, hint?: string): void {
	validateNonNegativeInteger(x);
	validateNonNegativeInteger(y);
	if (x > y) {
		throw new DomainError(
			`${describeValue(x)} must be less than or equal to ${describeValue(y)}`,
			{ value: describeValue(x), bound: describeValue(y) },
			hint,
		);
	}
}

/** Convert a validated integer to a bigint. */
export function toBigInt(x: IntegerLike): bigint {
	return typeof x === "bigint" ? x : BigInt(x);
}

/**
 * Convert a validated integer to a number for loop bounds and exponents.
 * @throws DomainError if a bigint does not fit in a safe integer
 */
export function toIndex(x: IntegerLike): number {
	if (typeof x === "number") return x;
	if (x > BigInt(Number.MAX_SAFE_INTEGER)) {
		throw new DomainError(`${describeValue(x)} exceeds the largest supported count`, {
			value: describeValue(x),
			max: Number.MAX_SAFE_INTEGER,
		});
	}
	return Number(x);
}

/**
 * @throws InvalidTypeError if `p` is not a number
 * @throws DomainError if `p` is NaN or outside [0, 1]
 */
export function validateProbability(p: unknown): asserts p is number {
	if (typeof p !== "number") {
		throw new InvalidTypeError(`${describeValue(p)} must be a number`, {
			value: describeValue(p),
			type: typeof p,
		});
	}
	if (!(p >= 0 && p <= 1)) {
		throw new DomainError(
			"probSuccess must be between 0 and 1, inclusive",
			{ value: p },
			"Pass a probability such as 0.25, not a percentage",
		);
	}
}
