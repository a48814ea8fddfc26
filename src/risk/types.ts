/**
 * Pre-trade guard types.
 *
 * Guards see a slim context of recent trading activity and return a verdict;
 * a block carries the guard name, a machine-readable reason and the values
 * that tripped it.
 */

export type GuardVerdict =
	| { readonly type: "allow" }
	| {
			readonly type: "block";
			readonly guard: string;
			readonly reason: string;
			readonly currentValue: number;
			readonly threshold: number;
	  };

export function allow(): GuardVerdict {
	return { type: "allow" };
}

export function blockWithValues(guard: string, reason: string, currentValue: number, threshold: number): GuardVerdict {
	return { type: "block", guard, reason, currentValue, threshold };
}

export function isBlocked(verdict: GuardVerdict): verdict is Extract<GuardVerdict, { type: "block" }> {
	return verdict.type === "block";
}

/** Trading activity a guard decides on. */
export interface TradeGuardContext {
	nowMs(): number;
	/** Trades placed since 00:00 UTC. */
	dailyTrades(): number;
	/** Time of the last trade, or null when none was recorded. */
	lastTradeAt(): number | null;
}

export interface TradeGuard {
	readonly name: string;
	check(ctx: TradeGuardContext): GuardVerdict;
}
