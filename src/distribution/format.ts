/**
 * Console presentation of a distribution: the probability table and the
 * summary statistics, one string per line.
 */

import type { Binomial } from "./binomial.js";

/**
 * `value.toFixed(places)` with ties broken to the even digit.
 *
 * `toFixed` already rounds the exact binary value, so the two differ only
 * where that value sits exactly halfway, as 0.125 does at two places:
 * `toFixed` gives "0.13", this gives "0.12".
 */
export function toFixedHalfEven(value: number, places: number): string {
	const rounded = value.toFixed(places);
	const magnitude = Math.abs(value);
	if (!Number.isFinite(value) || magnitude >= 1e21 || places >= 100) return rounded;

	const expanded = magnitude.toFixed(100);
	const cut = expanded.indexOf(".") + 1 + places;
	const rest = expanded.slice(cut);
	if (rest !== `5${"0".repeat(rest.length - 1)}`) return rounded;

	const kept = expanded.slice(0, cut).replace(/\.$/, "");
	if (Number(kept.slice(-1)) % 2 === 1) return rounded;
	return value < 0 ? `-${kept}` : kept;
}

/**
 * One `P(X=k) = 0.0312` line per outcome count, read from the table cached at
 * construction.
 */
export function formatDistribution(
	binomial: Binomial,
	places = binomial.config.displayPrecision,
): string[] {
	const lines: string[] = [];
	for (const [k, probability] of binomial.table) {
		lines.push(`P(X=${k}) = ${toFixedHalfEven(probability, places)}`);
	}
	return lines;
}

export function formatStats(
	binomial: Binomial,
	places = binomial.config.displayPrecision,
): string[] {
	return [
		`Expected Value (μ): ${toFixedHalfEven(binomial.expectedValue, places)}`,
		`Variance (σ²): ${toFixedHalfEven(binomial.variance, places)}`,
		`Skewness (γ₁): ${toFixedHalfEven(binomial.skewness, places)}`,
	];
}
