/**
 * LibDecimal: wrapper around decimal.js-light for the exact probability path.
 *
 * Each value carries the precision (significant digits) it was created with;
 * arithmetic results are rounded to the precision of the left operand.
 * Domain code uses this class and never imports decimal.js-light directly.
 */
import DecimalLight from "decimal.js-light";

export const DEFAULT_DECIMAL_PRECISION = 40;

type DecimalConstructor = ReturnType<typeof DecimalLight.clone>;

const constructors = new Map<number, DecimalConstructor>();

function constructorFor(precision: number): DecimalConstructor {
	const cached = constructors.get(precision);
	if (cached !== undefined) return cached;
	const ctor = DecimalLight.clone({ precision });
	constructors.set(precision, ctor);
	return ctor;
}

export class LibDecimal {
	private readonly raw: DecimalLight;
	readonly precision: number;

	private constructor(raw: DecimalLight, precision: number) {
		this.raw = raw;
		this.precision = precision;
	}

	// ── Factories ──────────────────────────────────────────────────

	/**
	 * Creates a LibDecimal from a string, a finite number or a bigint.
	 * Numbers enter through their shortest decimal representation, so
	 * `from(0.1)` is exactly one tenth.
	 * @throws Error if a number is not finite, a string is empty or precision is not a positive integer
	 * @example LibDecimal.from(120n)
	 * @example LibDecimal.from("0.3", 60)
	 */
	static from(value: string | number | bigint, precision = DEFAULT_DECIMAL_PRECISION): LibDecimal {
		if (!Number.isInteger(precision) || precision < 1) {
			throw new Error(`LibDecimal.from: invalid precision ${precision}`);
		}
		const Ctor = constructorFor(precision);
		if (typeof value === "bigint") {
			return new LibDecimal(new Ctor(value.toString()), precision);
		}
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new Ctor(value), precision);
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		return new LibDecimal(new Ctor(trimmed), precision);
	}

	static zero(precision = DEFAULT_DECIMAL_PRECISION): LibDecimal {
		return LibDecimal.from(0, precision);
	}

	static one(precision = DEFAULT_DECIMAL_PRECISION): LibDecimal {
		return LibDecimal.from(1, precision);
	}

	// ── Arithmetic (immutable) ─────────────────────────────────────

	add(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.plus(other.raw), this.precision);
	}

	sub(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.minus(other.raw), this.precision);
	}

	mul(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.times(other.raw), this.precision);
	}

	/**
	 * Integer power. `x.pow(0)` is one for every x, zero included.
	 * @throws Error if the exponent is not a non-negative integer
	 */
	pow(exponent: number): LibDecimal {
		if (!Number.isInteger(exponent) || exponent < 0) {
			throw new Error(`LibDecimal.pow: exponent must be a non-negative integer, got ${exponent}`);
		}
		if (exponent === 0) {
			return LibDecimal.one(this.precision);
		}
		return new LibDecimal(this.raw.toPower(exponent), this.precision);
	}

	// ── Comparison ─────────────────────────────────────────────────

	cmp(other: LibDecimal): -1 | 0 | 1 {
		const c = this.raw.comparedTo(other.raw);
		return c < 0 ? -1 : c > 0 ? 1 : 0;
	}

	eq(other: LibDecimal): boolean {
		return this.raw.equals(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	// ── Conversion ─────────────────────────────────────────────────

	/**
	 * Plain notation without trailing zeros.
	 * @example LibDecimal.from("0.1250").toString() // "0.125"
	 */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	/** @example LibDecimal.from("0.1640625").toFixed(4) // "0.1641" */
	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	/** Nearest double. May lose precision. */
	toNumber(): number {
		return this.raw.toNumber();
	}
}
