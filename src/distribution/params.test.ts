import { describe, expect, it } from "vitest";
import { ValidationError } from "../lib/validation/index.js";
import { ConfigError } from "../shared/errors.js";
import { isErr, isOk } from "../shared/result.js";
import { Binomial } from "./binomial.js";
import { binomialFromParams, parseBinomialParams } from "./params.js";

describe("parseBinomialParams", () => {
	it("accepts well-formed parameters", () => {
		expect(parseBinomialParams({ numTrials: 10, probSuccess: 0.3 })).toEqual({
			ok: true,
			value: { numTrials: 10, probSuccess: 0.3 },
		});
	});

	it("rejects a fractional number of trials", () => {
		const result = parseBinomialParams({ numTrials: 4.5, probSuccess: 0.3 });
		expect(isErr(result)).toBe(true);
		if (!result.ok) {
			expect(result.error).toBeInstanceOf(ValidationError);
			expect(result.error.message).toBe("Invalid binomial parameters");
			expect(result.error.issues.map((i) => i.path)).toEqual([["numTrials"]]);
		}
	});

	it("rejects strings, negatives and out-of-range probabilities", () => {
		const result = parseBinomialParams({ numTrials: -2, probSuccess: "0.3" });
		if (!result.ok) {
			expect(result.error.issues.map((i) => i.path)).toEqual([["numTrials"], ["probSuccess"]]);
		}
		expect(isErr(result)).toBe(true);
		expect(isErr(parseBinomialParams({ numTrials: 2, probSuccess: 1.2 }))).toBe(true);
	});

	it("rejects missing, extra and non-object input", () => {
		expect(isErr(parseBinomialParams({ numTrials: 2 }))).toBe(true);
		expect(isErr(parseBinomialParams({ numTrials: 2, probSuccess: 0.5, seed: 1 }))).toBe(true);
		expect(isErr(parseBinomialParams("n=2,p=0.5"))).toBe(true);
		expect(isErr(parseBinomialParams(null))).toBe(true);
	});
});

describe("binomialFromParams", () => {
	it("builds the distribution from valid input", () => {
		const result = binomialFromParams({ numTrials: 7, probSuccess: 0.5 });
		expect(isOk(result)).toBe(true);
		if (result.ok) {
			expect(result.value).toBeInstanceOf(Binomial);
			expect(result.value.probabilityK(2)).toBe(0.1640625);
		}
	});

	it("stops at the schema error", () => {
		const result = binomialFromParams({ numTrials: "7", probSuccess: 0.5 });
		if (!result.ok) expect(result.error).toBeInstanceOf(ValidationError);
		expect(isErr(result)).toBe(true);
	});

	it("passes options through to the constructor", () => {
		const result = binomialFromParams(
			{ numTrials: 3, probSuccess: 0.5 },
			{ config: { displayPrecision: 99 } },
		);
		if (!result.ok) expect(result.error).toBeInstanceOf(ConfigError);
		expect(isErr(result)).toBe(true);
	});
});
