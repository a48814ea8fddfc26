/**
 * Decimal — safe financial math.
 *
 * Prices, quantities, balances and PnL are Decimal, never raw `number`.
 * Backed by LibDecimal; the public API stays independent of the library.
 */

import { LibDecimal } from "../lib/decimal/index.js";

export class Decimal {
	private readonly inner: LibDecimal;

	private constructor(inner: LibDecimal) {
		this.inner = inner;
	}

	/** @throws Error on non-numeric input */
	static from(value: string | number): Decimal {
		return new Decimal(LibDecimal.from(value));
	}

	/** Parses exchange-supplied numeric strings; returns null instead of throwing. */
	static parse(value: string): Decimal | null {
		if (!/^-?\d+(\.\d+)?([eE][-+]?\d+)?$/.test(value.trim())) return null;
		return Decimal.from(value);
	}

	static zero(): Decimal {
		return new Decimal(LibDecimal.zero());
	}

	static one(): Decimal {
		return Decimal.from(1);
	}

	static min(a: Decimal, b: Decimal): Decimal {
		return a.lte(b) ? a : b;
	}

	static max(a: Decimal, b: Decimal): Decimal {
		return a.gte(b) ? a : b;
	}

	add(other: Decimal): Decimal {
		return new Decimal(this.inner.add(other.inner));
	}

	sub(other: Decimal): Decimal {
		return new Decimal(this.inner.sub(other.inner));
	}

	mul(other: Decimal): Decimal {
		return new Decimal(this.inner.mul(other.inner));
	}

	div(other: Decimal): Decimal {
		return new Decimal(this.inner.div(other.inner));
	}

	neg(): Decimal {
		return new Decimal(this.inner.neg());
	}

	abs(): Decimal {
		return new Decimal(this.inner.abs());
	}

	truncate(places: number): Decimal {
		return new Decimal(this.inner.truncate(places));
	}

	eq(other: Decimal): boolean {
		return this.inner.cmp(other.inner) === 0;
	}

	gt(other: Decimal): boolean {
		return this.inner.cmp(other.inner) > 0;
	}

	gte(other: Decimal): boolean {
		return this.inner.cmp(other.inner) >= 0;
	}

	lt(other: Decimal): boolean {
		return this.inner.cmp(other.inner) < 0;
	}

	lte(other: Decimal): boolean {
		return this.inner.cmp(other.inner) <= 0;
	}

	isZero(): boolean {
		return this.inner.isZero();
	}

	isPositive(): boolean {
		return !this.inner.isZero() && !this.inner.isNegative();
	}

	isNegative(): boolean {
		return this.inner.isNegative();
	}

	toNumber(): number {
		return this.inner.toNumber();
	}

	toFixed(places: number): string {
		return this.inner.toFixed(places);
	}

	toString(): string {
		return this.inner.toString();
	}

	/** Serialized as a plain string so store payloads round-trip without float loss. */
	toJSON(): string {
		return this.inner.toString();
	}
}
