import { describe, expect, it } from "vitest";
import { DEFAULT_DECIMAL_PRECISION, LibDecimal } from "./index.js";

describe("LibDecimal", () => {
	describe("factories", () => {
		it("creates from string", () => {
			expect(LibDecimal.from("1.5").toString()).toBe("1.5");
			expect(LibDecimal.from(" 100 ").toString()).toBe("100");
		});

		it("creates from number through its shortest representation", () => {
			expect(LibDecimal.from(0.1).toString()).toBe("0.1");
			expect(LibDecimal.from(0.3).toString()).toBe("0.3");
		});

		it("creates from bigint beyond double range", () => {
			const big = 10n ** 30n + 1n;
			expect(LibDecimal.from(big).toString()).toBe("1000000000000000000000000000001");
		});

		it("creates zero and one", () => {
			expect(LibDecimal.zero().toString()).toBe("0");
			expect(LibDecimal.one().toString()).toBe("1");
		});

		it("defaults to 40 significant digits", () => {
			expect(LibDecimal.one().precision).toBe(DEFAULT_DECIMAL_PRECISION);
			expect(LibDecimal.one(12).precision).toBe(12);
		});

		it("rejects empty string", () => {
			expect(() => LibDecimal.from("")).toThrow("empty string");
		});

		it("rejects NaN and Infinity", () => {
			expect(() => LibDecimal.from(Number.NaN)).toThrow("invalid number");
			expect(() => LibDecimal.from(Number.POSITIVE_INFINITY)).toThrow("invalid number");
		});

		it("rejects a non-positive precision", () => {
			expect(() => LibDecimal.from(1, 0)).toThrow("invalid precision 0");
		});
	});

	describe("arithmetic", () => {
		it("0.1 + 0.2 = 0.3 exactly", () => {
			expect(LibDecimal.from(0.1).add(LibDecimal.from(0.2)).toString()).toBe("0.3");
		});

		it("subtracts", () => {
			expect(LibDecimal.one().sub(LibDecimal.from(0.3)).toString()).toBe("0.7");
		});

		it("multiplies a bigint count by a fraction", () => {
			expect(LibDecimal.from(21n).mul(LibDecimal.from("0.0078125")).toString()).toBe("0.1640625");
		});

		it("raises to integer powers", () => {
			expect(LibDecimal.from("0.5").pow(7).toString()).toBe("0.0078125");
			expect(LibDecimal.from(2).pow(10).toString()).toBe("1024");
		});

		it("x^0 = 1, including 0^0", () => {
			expect(LibDecimal.from("42").pow(0).toString()).toBe("1");
			expect(LibDecimal.zero().pow(0).toString()).toBe("1");
		});

		it("0^k = 0 for k > 0", () => {
			expect(LibDecimal.zero().pow(3).isZero()).toBe(true);
		});

		it("rejects fractional and negative exponents", () => {
			expect(() => LibDecimal.from(2).pow(0.5)).toThrow("non-negative integer");
			expect(() => LibDecimal.from(2).pow(-1)).toThrow("non-negative integer");
		});

		it("rounds products to the configured precision", () => {
			const third = LibDecimal.from("0.3333333333", 4);
			expect(third.mul(LibDecimal.from(1, 4)).toString()).toBe("0.3333");
		});
	});

	describe("comparison", () => {
		it("cmp returns -1, 0, or 1", () => {
			expect(LibDecimal.from("1").cmp(LibDecimal.from("2"))).toBe(-1);
			expect(LibDecimal.from("2").cmp(LibDecimal.from("2"))).toBe(0);
			expect(LibDecimal.from("3").cmp(LibDecimal.from("2"))).toBe(1);
		});

		it("eq compares values, not representations", () => {
			expect(LibDecimal.from("1.50").eq(LibDecimal.from(1.5))).toBe(true);
		});
	});

	describe("conversion", () => {
		it("toString strips trailing zeros", () => {
			expect(LibDecimal.from("1.50").toString()).toBe("1.5");
			expect(LibDecimal.from("2.00").toString()).toBe("2");
		});

		it("toString never uses exponent notation", () => {
			expect(LibDecimal.from("0.5").pow(30).toString()).toBe(
				"0.000000000931322574615478515625",
			);
		});

		it("toFixed rounds half up", () => {
			expect(LibDecimal.from("0.1640625").toFixed(4)).toBe("0.1641");
			expect(LibDecimal.from("0.03125").toFixed(4)).toBe("0.0313");
		});

		it("toNumber converts to the nearest double", () => {
			expect(LibDecimal.from("0.1640625").toNumber()).toBe(0.1640625);
		});
	});
});
