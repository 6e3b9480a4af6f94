/**
 * Binomial distribution B(n, p).
 *
 * P(X = k) = C(n, k) * p^k * q^(n - k), with q = 1 - p.
 * C(n, k) is computed exactly and converted to a double only for the final
 * product; when it exceeds the double range the product is taken in decimal
 * arithmetic instead. The `*Exact` variants always keep the whole product in
 * decimal arithmetic.
 *
 * Instances are frozen: parameters are validated once, in the constructor.
 */

import { combinations } from "../combinatorics/factorial.js";
import {
	type IntegerLike,
	toIndex,
	validateLessEqual,
	validateNonNegativeInteger,
	validateProbability,
} from "../combinatorics/validate.js";
import { LibDecimal } from "../lib/decimal/index.js";
import { type Logger, sharedLogger } from "../lib/logger/index.js";
import { type BinomialConfig, resolveConfig } from "../shared/config.js";
import type { BinomialError } from "../shared/errors.js";
import { type Result, attempt } from "../shared/result.js";
import { toFixedHalfEven } from "./format.js";
import type { BinomialOptions, BinomialSummary, ProbabilityTable } from "./types.js";

export class Binomial {
	readonly numTrials: number;
	readonly probSuccess: number;
	readonly probFailure: number;
	readonly config: BinomialConfig;
	/** Full distribution computed at construction. */
	readonly table: ProbabilityTable;
	private readonly logger: Logger;

	/**
	 * @throws InvalidTypeError if numTrials is not an integer or probSuccess is not a number
	 * @throws DomainError if numTrials is negative or probSuccess is outside [0, 1]
	 */
	constructor(numTrials: IntegerLike, probSuccess: number, options: BinomialOptions = {}) {
		validateNonNegativeInteger(numTrials);
		validateProbability(probSuccess);

		this.numTrials = toIndex(numTrials);
		this.probSuccess = probSuccess;
		this.probFailure = 1 - probSuccess;
		this.config = resolveConfig(options.config);
		this.logger = (options.logger ?? sharedLogger(this.config.logLevel)).child({
			module: "binomial",
		});
		this.table = this.distribution;

		this.logger.debug(
			{ numTrials: this.numTrials, probSuccess: this.probSuccess },
			"Binomial distribution built",
		);
		Object.freeze(this);
	}

	/** Non-throwing constructor. */
	static create(
		numTrials: IntegerLike,
		probSuccess: number,
		options: BinomialOptions = {},
	): Result<Binomial, BinomialError> {
		return attempt(() => new Binomial(numTrials, probSuccess, options));
	}

	// ── Summary statistics ─────────────────────────────────────────

	/** μ = n * p */
	get expectedValue(): number {
		return this.numTrials * this.probSuccess;
	}

	/** σ² = n * p * q */
	get variance(): number {
		return this.numTrials * this.probSuccess * this.probFailure;
	}

	get standardDeviation(): number {
		return Math.sqrt(this.variance);
	}

	/**
	 * γ₁ = (q - p) / sqrt(n * p * q).
	 * Infinite or NaN when n * p * q is zero (n = 0, p = 0 or p = 1).
	 */
	get skewness(): number {
		const numerator = this.probFailure - this.probSuccess;
		const denominator = Math.sqrt(this.numTrials * this.probSuccess * this.probFailure);
		return numerator / denominator;
	}

	summary(): BinomialSummary {
		return {
			numTrials: this.numTrials,
			probSuccess: this.probSuccess,
			probFailure: this.probFailure,
			expectedValue: this.expectedValue,
			variance: this.variance,
			standardDeviation: this.standardDeviation,
			skewness: this.skewness,
		};
	}

	// ── Probability mass ───────────────────────────────────────────

	/** Freshly computed k → P(X = k) for every k in [0, n]. */
	get distribution(): ProbabilityTable {
		const table = new Map<number, number>();
		for (let k = 0; k <= this.numTrials; k++) {
			table.set(k, this.probabilityK(k));
		}
		return table;
	}

	/**
	 * P(X = k).
	 * @throws InvalidTypeError if k is not an integer
	 * @throws DomainError if k is negative or greater than n
	 */
	probabilityK(k: IntegerLike): number {
		this.validateOutcome(k);
		const successes = toIndex(k);
		const exactWays = combinations(this.numTrials, successes);
		const ways = Number(exactWays);
		if (!Number.isFinite(ways)) {
			this.logger.debug(
				{ numTrials: this.numTrials, k: successes },
				"C(n, k) exceeds the double range; evaluating in decimal",
			);
			return this.massExact(successes, exactWays).toNumber();
		}
		return ways * this.probSuccess ** successes * this.probFailure ** (this.numTrials - successes);
	}

	/**
	 * P(X <= k), summed from 0 upwards.
	 * @throws InvalidTypeError if k is not an integer
	 * @throws DomainError if k is negative or greater than n
	 */
	cumulative(k: IntegerLike): number {
		this.validateOutcome(k);
		return this.sumRange(0, toIndex(k));
	}

	/**
	 * P(k1 <= X <= k2).
	 * @throws InvalidTypeError if k1 or k2 is not an integer
	 * @throws DomainError if either bound is negative or greater than n, or k1 > k2
	 */
	cumulativeRange(k1: IntegerLike, k2: IntegerLike): number {
		this.validateRange(k1, k2);
		return this.sumRange(toIndex(k1), toIndex(k2));
	}

	// ── Exact (decimal) path ───────────────────────────────────────

	/** P(X = k) in decimal arithmetic at `config.decimalPrecision` significant digits. */
	probabilityExact(k: IntegerLike): LibDecimal {
		this.validateOutcome(k);
		const successes = toIndex(k);
		return this.massExact(successes, combinations(this.numTrials, successes));
	}

	cumulativeExact(k: IntegerLike): LibDecimal {
		this.validateOutcome(k);
		return this.sumRangeExact(0, toIndex(k));
	}

	cumulativeRangeExact(k1: IntegerLike, k2: IntegerLike): LibDecimal {
		this.validateRange(k1, k2);
		return this.sumRangeExact(toIndex(k1), toIndex(k2));
	}

	/** @example "Binomial experiment: n = 5, p = 0.50, q = 0.50" */
	toString(): string {
		const p = toFixedHalfEven(this.probSuccess, 2);
		const q = toFixedHalfEven(this.probFailure, 2);
		return `Binomial experiment: n = ${this.numTrials}, p = ${p}, q = ${q}`;
	}

	// ── Internals ──────────────────────────────────────────────────

	private get outcomeHint(): string {
		return `k must be between 0 and ${this.numTrials}`;
	}

	private validateOutcome(k: IntegerLike): void {
		validateNonNegativeInteger(k);
		validateLessEqual(k, this.numTrials, this.outcomeHint);
	}

	private validateRange(k1: IntegerLike, k2: IntegerLike): void {
		validateNonNegativeInteger(k1);
		validateNonNegativeInteger(k2);
		validateLessEqual(k1, this.numTrials, this.outcomeHint);
		validateLessEqual(k2, this.numTrials, this.outcomeHint);
		validateLessEqual(k1, k2, "k1 must not exceed k2");
	}

	/** C(n, k) * p^k * q^(n - k) at `config.decimalPrecision` significant digits. */
	private massExact(successes: number, ways: bigint): LibDecimal {
		const precision = this.config.decimalPrecision;
		const p = LibDecimal.from(this.probSuccess, precision);
		const q = LibDecimal.one(precision).sub(p);
		return LibDecimal.from(ways, precision)
			.mul(p.pow(successes))
			.mul(q.pow(this.numTrials - successes));
	}

	private sumRange(from: number, to: number): number {
		let total = 0;
		for (let i = from; i <= to; i++) {
			total += this.probabilityK(i);
		}
		return total;
	}

	private sumRangeExact(from: number, to: number): LibDecimal {
		let total = LibDecimal.zero(this.config.decimalPrecision);
		for (let i = from; i <= to; i++) {
			total = total.add(this.probabilityExact(i));
		}
		return total;
	}
}
