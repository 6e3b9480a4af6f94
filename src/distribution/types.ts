/**
 * Binomial distribution types.
 */

import type { Logger } from "../lib/logger/index.js";
import type { BinomialConfig } from "../shared/config.js";

/** Outcome count k mapped to P(X = k), iterated in increasing k. */
export type ProbabilityTable = ReadonlyMap<number, number>;

export interface BinomialOptions {
	/** Receives construction (debug) and overflow (warn) lines; built from `config.logLevel` when omitted */
	readonly logger?: Logger;
	readonly config?: Partial<BinomialConfig>;
}

/** Parameters and summary statistics of one distribution. */
export interface BinomialSummary {
	readonly numTrials: number;
	readonly probSuccess: number;
	readonly probFailure: number;
	readonly expectedValue: number;
	readonly variance: number;
	readonly standardDeviation: number;
	readonly skewness: number;
}

/** Untrusted `(n, p)` input after schema validation. */
export interface BinomialParams {
	readonly numTrials: number;
	readonly probSuccess: number;
}
