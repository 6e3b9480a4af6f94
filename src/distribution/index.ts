/**
 * Binomial distribution: probability mass, cumulative sums, summary
 * statistics, presentation and boundary parsing.
 */

export type {
	BinomialOptions,
	BinomialParams,
	BinomialSummary,
	ProbabilityTable,
} from "./types.js";
export { Binomial } from "./binomial.js";
export { formatDistribution, formatStats, toFixedHalfEven } from "./format.js";
export { binomialParamsSchema, parseBinomialParams, binomialFromParams } from "./params.js";
