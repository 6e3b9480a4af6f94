/**
 * Binomial Demo: probability tables, summary statistics and cumulative sums.
 *
 * Run: npx tsx examples/binomial-demo.ts [numTrials] [probSuccess]
 */

import {
	Binomial,
	binomialFromParams,
	configFromEnv,
	formatDistribution,
	formatStats,
	toFixedHalfEven,
} from "../src/index.js";

function show(binomial: Binomial): void {
	console.log(String(binomial));
	for (const line of formatDistribution(binomial)) console.log(`  ${line}`);
	for (const line of formatStats(binomial)) console.log(`  ${line}`);
	console.log();
}

const config = configFromEnv();
const [rawTrials, rawProb] = process.argv.slice(2);

if (rawTrials !== undefined && rawProb !== undefined) {
	const result = binomialFromParams(
		{ numTrials: Number(rawTrials), probSuccess: Number(rawProb) },
		{ config },
	);
	if (!result.ok) {
		console.error(JSON.stringify(result.error.toJSON(), null, 2));
		process.exitCode = 1;
	} else {
		show(result.value);
	}
} else {
	const fair = new Binomial(5, 0.5, { config });
	show(fair);

	const skewed = new Binomial(6, 0.25, { config });
	show(skewed);

	const places = skewed.config.displayPrecision;
	console.log("Cumulative:");
	console.log(`  P(X <= 2) = ${toFixedHalfEven(skewed.cumulative(2), places)}`);
	console.log(`  P(1 <= X <= 3) = ${toFixedHalfEven(skewed.cumulativeRange(1, 3), places)}`);
	console.log(`  P(X = 2) exact = ${skewed.probabilityExact(2).toString()}`);
}
