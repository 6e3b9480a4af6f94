/**
 * Boundary parsing for `(n, p)` supplied by users, files or other processes.
 */

import { type ValidationError, validate, z } from "../lib/validation/index.js";
import type { BinomialError } from "../shared/errors.js";
import { type Result, flatMap } from "../shared/result.js";
import { Binomial } from "./binomial.js";
import type { BinomialOptions, BinomialParams } from "./types.js";

export const binomialParamsSchema = z
	.object({
		numTrials: z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER),
		probSuccess: z.number().min(0).max(1),
	})
	.strict();

export function parseBinomialParams(raw: unknown): Result<BinomialParams, ValidationError> {
	return validate(binomialParamsSchema, raw, "Invalid binomial parameters");
}

/** Parse untrusted parameters and build the distribution, without throwing. */
export function binomialFromParams(
	raw: unknown,
	options: BinomialOptions = {},
): Result<Binomial, BinomialError> {
	return flatMap<BinomialParams, Binomial, BinomialError>(parseBinomialParams(raw), (params) =>
		Binomial.create(params.numTrials, params.probSuccess, options),
	);
}
