/**
 * StrategyEvaluator — rolling close window, MA crossover and cost filter.
 *
 * In intelligent mode the symmetric plan only trades when the evaluator
 * agrees with its direction, and sells never dip into the core holding.
 */

import { Decimal } from "../shared/decimal.js";
import { CostFilter } from "./cost-filter.js";
import { maCrossover } from "./ma-signal.js";
import {
	type MaSignal,
	PlanReason,
	RebalanceAction,
	type RebalancePlan,
	type StrategyDecision,
} from "./types.js";

export interface StrategyEvaluatorConfig {
	/** Default 7. */
	readonly shortPeriod?: number;
	/** Default 25; also the window size. */
	readonly longPeriod?: number;
	readonly costFilter?: CostFilter;
}

export class StrategyEvaluator {
	readonly shortPeriod: number;
	readonly longPeriod: number;
	private readonly costFilter: CostFilter;
	private closes: Decimal[] = [];

	/** @throws RangeError unless 1 <= shortPeriod < longPeriod */
	constructor(config: StrategyEvaluatorConfig = {}) {
		this.shortPeriod = config.shortPeriod ?? 7;
		this.longPeriod = config.longPeriod ?? 25;
		if (this.shortPeriod < 1 || this.shortPeriod >= this.longPeriod) {
			throw new RangeError(
				`MA periods must satisfy 1 <= short < long, got ${this.shortPeriod}/${this.longPeriod}`,
			);
		}
		this.costFilter = config.costFilter ?? new CostFilter();
	}

	get windowSize(): number {
		return this.closes.length;
	}

	/** Appends one close, dropping the oldest beyond the long period. */
	observe(close: Decimal): void {
		this.closes.push(close);
		if (this.closes.length > this.longPeriod) {
			this.closes.splice(0, this.closes.length - this.longPeriod);
		}
	}

	/** Replaces the window with `closes` (most recent last). */
	seed(closes: readonly Decimal[]): void {
		this.closes = closes.slice(-this.longPeriod);
	}

	/** Null until the window holds `longPeriod` closes. */
	signal(): MaSignal | null {
		return maCrossover(this.closes, this.shortPeriod, this.longPeriod);
	}

	evaluate(price: Decimal, avgCost: Decimal | null): StrategyDecision {
		return this.costFilter.decide(this.signal(), price, avgCost);
	}
}

/**
 * Gates a symmetric plan with a strategy decision. A plan that already holds
 * stays as it is; a trade survives only when the decision points the same
 * way, and otherwise holds with `no_clear_signal`.
 * Sells are clamped to the tradeable tier, `held * (1 - coreRatio)`.
 */
export function intelligentPlan(
	plan: RebalancePlan,
	decision: StrategyDecision,
	held: Decimal,
	coreRatio: Decimal,
): RebalancePlan {
	const hold = (reason: PlanReason): RebalancePlan => ({
		...plan,
		action: RebalanceAction.Hold,
		quantity: Decimal.zero(),
		notional: plan.delta.abs(),
		reason,
	});

	if (plan.action === RebalanceAction.Hold) return plan;
	if (plan.action !== decision.action) return hold(PlanReason.NoClearSignal);

	if (plan.action === RebalanceAction.Buy) {
		return { ...plan, reason: PlanReason.GoldenCrossBelowCost };
	}
	const tradeable = held.mul(Decimal.one().sub(coreRatio));
	const quantity = Decimal.min(plan.quantity, tradeable);
	if (!quantity.isPositive()) return hold(PlanReason.CoreProtected);
	return {
		...plan,
		quantity,
		notional: quantity.mul(plan.price),
		reason: PlanReason.DeathCrossAboveMargin,
	};
}
