import type { GuardVerdict, TradeGuard, TradeGuardContext } from "./types.js";
import { allow, blockWithValues } from "./types.js";

/**
 * Blocks once `maxTrades` trades were placed on the current UTC day.
 *
 * @example
 * ```ts
 * const guard = DailyLimitGuard.create(5);
 * ```
 */
export class DailyLimitGuard implements TradeGuard {
	readonly name = "DailyLimit";
	private readonly maxTrades: number;

	private constructor(maxTrades: number) {
		this.maxTrades = maxTrades;
	}

	/** @throws RangeError when `maxTrades` is not a non-negative integer */
	static create(maxTrades: number): DailyLimitGuard {
		if (!Number.isInteger(maxTrades) || maxTrades < 0) {
			throw new RangeError(`maxTrades must be a non-negative integer, got ${maxTrades}`);
		}
		return new DailyLimitGuard(maxTrades);
	}

	check(ctx: TradeGuardContext): GuardVerdict {
		const count = ctx.dailyTrades();
		if (count >= this.maxTrades) {
			return blockWithValues(this.name, "daily_trade_limit", count, this.maxTrades);
		}
		return allow();
	}
}

/**
 * Enforces a minimum delay between two trades.
 *
 * @example
 * ```ts
 * const guard = CooldownGuard.fromSecs(300);
 * ```
 */
export class CooldownGuard implements TradeGuard {
	readonly name = "Cooldown";
	private readonly cooldownMs: number;

	private constructor(cooldownMs: number) {
		this.cooldownMs = cooldownMs;
	}

	static create(cooldownMs: number): CooldownGuard {
		return new CooldownGuard(cooldownMs);
	}

	static fromSecs(secs: number): CooldownGuard {
		return new CooldownGuard(secs * 1_000);
	}

	check(ctx: TradeGuardContext): GuardVerdict {
		const last = ctx.lastTradeAt();
		if (last === null) return allow();
		const elapsed = ctx.nowMs() - last;
		if (elapsed < this.cooldownMs) {
			return blockWithValues(this.name, "trade_interval", elapsed, this.cooldownMs);
		}
		return allow();
	}
}

/** First block wins; guards run in the order given. */
export function checkAll(guards: readonly TradeGuard[], ctx: TradeGuardContext): GuardVerdict {
	for (const guard of guards) {
		const verdict = guard.check(ctx);
		if (verdict.type === "block") return verdict;
	}
	return allow();
}
