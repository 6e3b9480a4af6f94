/**
 * Exact combinatorics and the integer guards shared with the distribution layer.
 */

export { factorial, combinations } from "./factorial.js";
export {
	type IntegerLike,
	isIntegerLike,
	validateNonNegativeInteger,
	validateLessEqual,
	validateProbability,
	toBigInt,
	toIndex,
} from "./validate.js";
