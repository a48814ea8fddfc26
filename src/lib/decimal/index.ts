/**
 * LibDecimal — thin wrapper around decimal.js-light.
 *
 * Domain code goes through the shared/decimal facade and never imports
 * decimal.js-light directly.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	/**
	 * @throws Error if value is a non-finite number, an empty string, or not numeric
	 * @example LibDecimal.from("0.0213")
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		return new LibDecimal(new DecimalLight(trimmed));
	}

	static zero(): LibDecimal {
		return new LibDecimal(new DecimalLight(0));
	}

	add(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.plus(other.raw));
	}

	sub(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.minus(other.raw));
	}

	mul(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.times(other.raw));
	}

	/** @throws Error when dividing by zero */
	div(other: LibDecimal): LibDecimal {
		if (other.raw.isZero()) {
			throw new Error("LibDecimal.div: division by zero");
		}
		return new LibDecimal(this.raw.dividedBy(other.raw));
	}

	neg(): LibDecimal {
		return new LibDecimal(this.raw.negated());
	}

	abs(): LibDecimal {
		return new LibDecimal(this.raw.absoluteValue());
	}

	/** Truncates toward zero at `places` decimals (exchange step sizes never round up). */
	truncate(places: number): LibDecimal {
		return new LibDecimal(this.raw.toDecimalPlaces(places, DecimalLight.ROUND_DOWN));
	}

	cmp(other: LibDecimal): number {
		return this.raw.comparedTo(other.raw);
	}

	isZero(): boolean {
		return this.raw.isZero();
	}

	isNegative(): boolean {
		return this.raw.isNegative();
	}

	/** Plain notation with trailing zeros removed, e.g. "1.5" for "1.500". */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) return fixed;
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}

	toFixed(places: number): string {
		return this.raw.toFixed(places);
	}

	toNumber(): number {
		return this.raw.toNumber();
	}
}
