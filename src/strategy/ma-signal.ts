import { Decimal } from "../shared/decimal.js";
import { MaCross, type MaSignal } from "./types.js";

/**
 * Simple Moving Average over the last `period` closes.
 * Returns null if insufficient data or invalid period.
 */
export function calcSMA(closes: readonly Decimal[], period: number): Decimal | null {
	if (period < 1 || closes.length < period) return null;

	let sum = Decimal.zero();
	for (const close of closes.slice(closes.length - period)) {
		sum = sum.add(close);
	}
	return sum.div(Decimal.from(period));
}

/**
 * Short/long SMA crossover over the same close series (most recent last).
 * Golden when the short average is above the long one, death when below.
 * Returns null until `longPeriod` closes are available.
 *
 * @throws RangeError unless 1 <= shortPeriod < longPeriod
 */
export function maCrossover(
	closes: readonly Decimal[],
	shortPeriod: number,
	longPeriod: number,
): MaSignal | null {
	if (shortPeriod < 1 || shortPeriod >= longPeriod) {
		throw new RangeError(`MA periods must satisfy 1 <= short < long, got ${shortPeriod}/${longPeriod}`);
	}
	const maShort = calcSMA(closes, shortPeriod);
	const maLong = calcSMA(closes, longPeriod);
	if (maShort === null || maLong === null) return null;

	let cross: MaCross = MaCross.Neutral;
	if (maShort.isPositive() && maLong.isPositive()) {
		if (maShort.gt(maLong)) cross = MaCross.Golden;
		else if (maShort.lt(maLong)) cross = MaCross.Death;
	}
	const strengthPct = maLong.isZero()
		? Decimal.zero()
		: maShort.div(maLong).sub(Decimal.one()).mul(Decimal.from(100));
	return { cross, maShort, maLong, strengthPct };
}
