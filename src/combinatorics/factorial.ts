import {
	type IntegerLike,
	toBigInt,
	validateLessEqual,
	validateNonNegativeInteger,
} from "./validate.js";

/**
 * n! as an exact bigint.
 *
 * @example factorial(5) // 120n
 * @throws InvalidTypeError if n is not an integer
 * @throws DomainError if n is negative
 */
export function factorial(n: IntegerLike): bigint {
	validateNonNegativeInteger(n);
	const m = toBigInt(n);
	let result = 1n;
	for (let i = 2n; i <= m; i++) {
		result *= i;
	}
	return result;
}

/**
 * Number of r-combinations of n elements, n! / (r! (n - r)!), with exact
 * integer division.
 *
 * @example combinations(4, 2) // 6n
 * @throws InvalidTypeError if n or r is not an integer
 * @throws DomainError if n or r is negative, or r > n
 */
export function combinations(n: IntegerLike, r: IntegerLike): bigint {
	validateNonNegativeInteger(n);
	validateNonNegativeInteger(r);
	validateLessEqual(r, n);
	const total = toBigInt(n);
	const chosen = toBigInt(r);
	return factorial(total) / (factorial(chosen) * factorial(total - chosen));
}
