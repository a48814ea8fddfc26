/**
 * CostFilter — keeps crossover trades on the right side of the cost basis.
 *
 * Buy only at or below `avgCost * buyThreshold`; sell only at or above
 * `avgCost * sellThreshold`. Without a cost basis there is nothing to protect
 * on the buy side, and nothing known to be in profit on the sell side.
 */

import { Decimal } from "../shared/decimal.js";
import { MaCross, type MaSignal, PlanReason, RebalanceAction, type StrategyDecision } from "./types.js";

export interface CostFilterConfig {
	/** Default 1.00. */
	readonly buyThreshold?: Decimal;
	/** Default 1.03, a 3% minimum margin. */
	readonly sellThreshold?: Decimal;
}

export class CostFilter {
	private readonly buyThreshold: Decimal;
	private readonly sellThreshold: Decimal;

	constructor(config: CostFilterConfig = {}) {
		this.buyThreshold = config.buyThreshold ?? Decimal.one();
		this.sellThreshold = config.sellThreshold ?? Decimal.from("1.03");
	}

	allowsBuy(price: Decimal, avgCost: Decimal | null): boolean {
		if (avgCost === null) return true;
		return price.lte(avgCost.mul(this.buyThreshold));
	}

	allowsSell(price: Decimal, avgCost: Decimal | null): boolean {
		if (avgCost === null) return false;
		return price.gte(avgCost.mul(this.sellThreshold));
	}

	/** Golden cross plus a favourable buy price is Buy; death cross plus margin is Sell. */
	decide(signal: MaSignal | null, price: Decimal, avgCost: Decimal | null): StrategyDecision {
		if (signal?.cross === MaCross.Golden && this.allowsBuy(price, avgCost)) {
			return { action: RebalanceAction.Buy, reason: PlanReason.GoldenCrossBelowCost, signal, avgCost };
		}
		if (signal?.cross === MaCross.Death && this.allowsSell(price, avgCost)) {
			return { action: RebalanceAction.Sell, reason: PlanReason.DeathCrossAboveMargin, signal, avgCost };
		}
		return { action: RebalanceAction.Hold, reason: PlanReason.NoClearSignal, signal, avgCost };
	}
}
