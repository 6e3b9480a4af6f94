import { describe, expect, it } from "vitest";
import { DomainError, InvalidTypeError } from "../shared/errors.js";
import { combinations, factorial } from "./factorial.js";

describe("factorial", () => {
	it("returns 1 for 0 and 1", () => {
		expect(factorial(0)).toBe(1n);
		expect(factorial(1)).toBe(1n);
	});

	it.each([
		[2, 2n],
		[3, 6n],
		[4, 24n],
		[5, 120n],
		[10, 3628800n],
	])("%i! = %s", (n, expected) => {
		expect(factorial(n)).toBe(expected);
	});

	it("stays exact past the double range of integers", () => {
		expect(factorial(25)).toBe(15511210043330985984000000n);
	});

	it("accepts bigint arguments", () => {
		expect(factorial(6n)).toBe(720n);
	});

	it("raises a domain error for negative input", () => {
		expect(() => factorial(-4)).toThrow(DomainError);
	});

	it("raises a type error for non-integer input", () => {
		expect(() => factorial(4.5)).toThrow(InvalidTypeError);
		expect(() => factorial(Number.NaN)).toThrow(InvalidTypeError);
	});
});

describe("combinations", () => {
	it.each([
		[0, 1n],
		[1, 4n],
		[2, 6n],
		[3, 4n],
		[4, 1n],
	])("C(4, %i) = %s", (r, expected) => {
		expect(combinations(4, r)).toBe(expected);
	});

	it("C(0, 0) = 1", () => {
		expect(combinations(0, 0)).toBe(1n);
	});

	it("keeps exact values for large n", () => {
		expect(combinations(100, 50)).toBe(100891344545564193334812497256n);
	});

	it("raises a domain error on negative inputs", () => {
		expect(() => combinations(-4, 1)).toThrow(DomainError);
		expect(() => combinations(4, -1)).toThrow(DomainError);
	});

	it("raises a domain error when r > n", () => {
		expect(() => combinations(3, 5)).toThrow("5 must be less than or equal to 3");
	});

	it("raises a type error on non-integer inputs", () => {
		expect(() => combinations(4.5, 1)).toThrow(InvalidTypeError);
		expect(() => combinations(4, 1.5)).toThrow(InvalidTypeError);
	});

	it("validates n before r", () => {
		expect(() => combinations(-1, 1.5)).toThrow(DomainError);
	});
});
