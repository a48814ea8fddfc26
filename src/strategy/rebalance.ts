/**
 * Symmetric value rebalance.
 *
 * Keeps the base asset's share of portfolio value near `targetRatio`. The
 * hysteresis band (absolute `minNotional`, relative `thresholdPct`) stops
 * every small price move from producing a trade.
 */

import { Decimal } from "../shared/decimal.js";
import { PlanReason, type PortfolioBalances, RebalanceAction, type RebalancePlan } from "./types.js";

/**
 * @param targetRatio - desired base share of total value, in [0, 1]
 * @param minNotional - smallest deviation, in quote, worth trading
 * @param thresholdPct - smallest deviation as a fraction of total value
 * @example
 * computePlan({ base: d(100), quote: d(100) }, d(2), d("0.5"), d(5), d("0.01"));
 * // Sell 25
 */
export function computePlan(
	balances: PortfolioBalances,
	price: Decimal,
	targetRatio: Decimal,
	minNotional: Decimal,
	thresholdPct: Decimal,
): RebalancePlan {
	const baseValue = balances.base.mul(price);
	const totalValue = baseValue.add(balances.quote);
	const targetValue = totalValue.mul(targetRatio);
	const delta = baseValue.sub(targetValue);
	const deviation = delta.abs();

	const base = { price, targetRatio, totalValue, targetValue, delta };
	const hold = (reason: PlanReason): RebalancePlan => ({
		...base,
		action: RebalanceAction.Hold,
		quantity: Decimal.zero(),
		notional: deviation,
		reason,
	});

	if (!price.isPositive() || !totalValue.isPositive()) {
		return hold(PlanReason.InsufficientPriceOrBalance);
	}
	if (deviation.isZero() || deviation.lt(minNotional) || deviation.div(totalValue).lt(thresholdPct)) {
		return hold(PlanReason.WithinThreshold);
	}

	const wanted = deviation.div(price);
	if (delta.isPositive()) {
		const quantity = Decimal.min(wanted, balances.base);
		return {
			...base,
			action: RebalanceAction.Sell,
			quantity,
			notional: quantity.mul(price),
			reason: PlanReason.AboveTarget,
		};
	}

	const quantity = Decimal.min(wanted, balances.quote.div(price));
	if (!quantity.isPositive()) return hold(PlanReason.InsufficientQuote);
	return {
		...base,
		action: RebalanceAction.Buy,
		quantity,
		notional: quantity.mul(price),
		reason: PlanReason.BelowTarget,
	};
}
