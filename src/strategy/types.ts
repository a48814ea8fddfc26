/**
 * Rebalance and strategy type definitions.
 */

import type { Decimal } from "../shared/decimal.js";

// ── Plan action ─────────────────────────────────────────────────────

export const RebalanceAction = {
	Hold: "HOLD",
	Buy: "BUY",
	Sell: "SELL",
} as const;

export type RebalanceAction = (typeof RebalanceAction)[keyof typeof RebalanceAction];

// ── Reason tags ─────────────────────────────────────────────────────

/** Why a plan holds or trades; persisted with the plan for audit. */
export const PlanReason = {
	InsufficientPriceOrBalance: "insufficient_price_or_balance",
	WithinThreshold: "within_threshold",
	InsufficientQuote: "insufficient_quote",
	AboveTarget: "above_target",
	BelowTarget: "below_target",
	GoldenCrossBelowCost: "golden_cross_below_cost",
	DeathCrossAboveMargin: "death_cross_above_margin",
	NoClearSignal: "no_clear_signal",
	CoreProtected: "core_protected",
} as const;

export type PlanReason = (typeof PlanReason)[keyof typeof PlanReason];

// ── Inputs ──────────────────────────────────────────────────────────

/** Tradeable balances: base asset quantity and quote cash. */
export interface PortfolioBalances {
	readonly base: Decimal;
	readonly quote: Decimal;
}

// ── Plan ────────────────────────────────────────────────────────────

/** Output of the rebalance engine; never mutated after creation. */
export interface RebalancePlan {
	readonly action: RebalanceAction;
	/** Base quantity to trade; zero on Hold. */
	readonly quantity: Decimal;
	/** Quote value of `quantity` at `price`; on Hold, the absolute deviation. */
	readonly notional: Decimal;
	readonly reason: PlanReason;
	readonly price: Decimal;
	readonly targetRatio: Decimal;
	readonly totalValue: Decimal;
	readonly targetValue: Decimal;
	/** Base value minus target value; positive means overweight. */
	readonly delta: Decimal;
}

// ── Moving-average signal ───────────────────────────────────────────

export const MaCross = {
	Golden: "golden_cross",
	Death: "death_cross",
	Neutral: "neutral",
} as const;

export type MaCross = (typeof MaCross)[keyof typeof MaCross];

export interface MaSignal {
	readonly cross: MaCross;
	readonly maShort: Decimal;
	readonly maLong: Decimal;
	/** `(maShort / maLong - 1) * 100`. */
	readonly strengthPct: Decimal;
}

/** Buy/Sell/Hold after the cost filter has seen the crossover. */
export interface StrategyDecision {
	readonly action: RebalanceAction;
	readonly reason: PlanReason;
	readonly signal: MaSignal | null;
	readonly avgCost: Decimal | null;
}
