/**
 * Per-symbol record of executed trades in the permanent partition: a
 * counter per UTC day, the time of the last trade and a capped
 * history, newest first.
 *
 * Writers hold the task lease, so read-modify-write needs no further locking.
 */

import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { z } from "../lib/validation/index.js";
import type { ValidationError } from "../shared/errors.js";
import type { TradingSymbol } from "../shared/identifiers.js";
import { OrderSide } from "../shared/order-side.js";
import { type Result, ok } from "../shared/result.js";
import { readJson, writePermanentJson } from "../store/json.js";
import { StoreKeys } from "../store/keys.js";
import type { StateStore } from "../store/types.js";

/** An executed order; quantities as exchange decimal strings. */
export interface TradeRecord {
	readonly orderId: string;
	readonly side: OrderSide;
	readonly quantity: string;
	readonly quoteQuantity: string;
	readonly reason: string;
	readonly at: number;
}

export interface TradeActivity {
	readonly dailyTrades: number;
	readonly lastTradeAt: number | null;
}

export interface TradeJournalDeps {
	readonly store: StateStore;
	readonly logger?: Logger;
	/** Default 500. */
	readonly maxHistory?: number;
}

const tradeRecordSchema = z.object({
	orderId: z.string(),
	side: z.enum([OrderSide.Buy, OrderSide.Sell]),
	quantity: z.string(),
	quoteQuantity: z.string(),
	reason: z.string(),
	at: z.number(),
});
const historySchema = z.array(tradeRecordSchema);
const countSchema = z.number().int().nonnegative();
const timestampSchema = z.number();

/** UTC calendar day of `at`, `YYYY-MM-DD`. */
export function utcDay(at: number): string {
	return new Date(at).toISOString().slice(0, 10);
}

export class TradeJournal {
	private readonly store: StateStore;
	private readonly logger: Logger;
	private readonly maxHistory: number;

	constructor(deps: TradeJournalDeps) {
		this.store = deps.store;
		this.logger = (deps.logger ?? silentLogger).child({ component: "trade-journal" });
		this.maxHistory = deps.maxHistory ?? 500;
	}

	async activity(symbol: TradingSymbol, now: number): Promise<Result<TradeActivity, ValidationError>> {
		const count = await readJson(this.store, StoreKeys.tradesDaily(symbol, utcDay(now)), countSchema);
		if (!count.ok) return count;
		const last = await readJson(this.store, StoreKeys.tradesLast(symbol), timestampSchema);
		if (!last.ok) return last;
		return ok({ dailyTrades: count.value ?? 0, lastTradeAt: last.value });
	}

	/** Newest first, at most `limit` entries. */
	async history(symbol: TradingSymbol, limit = 100): Promise<Result<TradeRecord[], ValidationError>> {
		const res = await readJson(this.store, StoreKeys.tradesHistory(symbol), historySchema);
		if (!res.ok) return res;
		return ok((res.value ?? []).slice(0, limit));
	}

	/**
	 * Counts the trade against its UTC day, moves the last-trade time and
	 * prepends it to the history. Counters of earlier days are removed.
	 */
	async record(symbol: TradingSymbol, trade: TradeRecord): Promise<Result<TradeActivity, ValidationError>> {
		const current = await this.activity(symbol, trade.at);
		if (!current.ok) return current;
		const history = await this.history(symbol, this.maxHistory);
		if (!history.ok) return history;

		const day = utcDay(trade.at);
		const dailyTrades = current.value.dailyTrades + 1;
		await writePermanentJson(this.store, StoreKeys.tradesDaily(symbol, day), dailyTrades);
		await writePermanentJson(this.store, StoreKeys.tradesLast(symbol), trade.at);
		await writePermanentJson(
			this.store,
			StoreKeys.tradesHistory(symbol),
			[trade, ...history.value].slice(0, this.maxHistory),
		);

		const today = StoreKeys.tradesDaily(symbol, day);
		for (const key of await this.store.keys(StoreKeys.tradesDaily(symbol, ""))) {
			if (key !== today) await this.store.delete(key);
		}

		this.logger.info({ symbol, orderId: trade.orderId, dailyTrades }, "trade recorded");
		return ok({ dailyTrades, lastTradeAt: trade.at });
	}
}
