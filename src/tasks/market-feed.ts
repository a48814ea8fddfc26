/**
 * MarketFeed — writes streamed market and account facts into the store.
 *
 * Events are applied one at a time in arrival order, so read-modify-write
 * updates such as balance deltas never interleave.
 */

import type { Unsubscribe } from "../lib/events/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { OrderBookReconciler } from "../orderbook/reconciler.js";
import { Decimal } from "../shared/decimal.js";
import { type TradingSymbol, tradingSymbol } from "../shared/identifiers.js";
import type { MarketState } from "../store/market-state.js";
import type { StreamEvent } from "../stream/types.js";

/** Where events come from; StreamSupervisor satisfies it. */
export interface EventSource {
	onEvent(handler: (event: StreamEvent) => void): Unsubscribe;
}

export interface MarketFeedDeps {
	readonly market: MarketState;
	/** Depth diffs for symbols without a reconciler are dropped. */
	readonly books?: ReadonlyMap<TradingSymbol, OrderBookReconciler>;
	readonly logger?: Logger;
}

export class MarketFeed {
	private readonly market: MarketState;
	private readonly books: ReadonlyMap<TradingSymbol, OrderBookReconciler>;
	private readonly logger: Logger;
	private tail: Promise<void> = Promise.resolve();
	private _applied = 0;
	private _failed = 0;

	constructor(deps: MarketFeedDeps) {
		this.market = deps.market;
		this.books = deps.books ?? new Map();
		this.logger = (deps.logger ?? silentLogger).child({ component: "market-feed" });
	}

	get applied(): number {
		return this._applied;
	}

	get failed(): number {
		return this._failed;
	}

	attach(source: EventSource): Unsubscribe {
		return source.onEvent((event) => {
			this.enqueue(event);
		});
	}

	/** Queues `event` behind those already pending. */
	enqueue(event: StreamEvent): void {
		this.tail = this.tail.then(() => this.apply(event));
	}

	/** Resolves once every queued event has been applied. */
	drain(): Promise<void> {
		return this.tail;
	}

	private async apply(event: StreamEvent): Promise<void> {
		try {
			await this.handle(event);
			this._applied += 1;
		} catch (error) {
			this._failed += 1;
			this.logger.error({ kind: event.kind, channel: event.channel, error: String(error) }, "event not applied");
		}
	}

	private async handle(event: StreamEvent): Promise<void> {
		const symbol = event.symbol === null ? null : tradingSymbol(event.symbol);
		switch (event.kind) {
			case "trade": {
				const last = event.payload.deals.at(-1);
				if (symbol === null || last === undefined) return;
				await this.market.publishPrice(symbol, last.price, event.receivedAt);
				return;
			}
			case "book_ticker": {
				if (symbol === null) return;
				const { bidPrice, askPrice } = event.payload;
				if (!bidPrice.isPositive() || !askPrice.isPositive()) return;
				const mid = bidPrice.add(askPrice).div(Decimal.from(2));
				await this.market.publishPrice(symbol, mid, event.receivedAt);
				return;
			}
			case "account_balance_delta": {
				const { asset, free, locked, time } = event.payload;
				await this.market.applyBalanceDelta(
					{ asset, free: free.toString(), locked: locked.toString() },
					time > 0 ? time : event.receivedAt,
				);
				return;
			}
			case "depth_diff": {
				const book = symbol === null ? undefined : this.books.get(symbol);
				if (book === undefined) return;
				const res = await book.ingest(event.payload);
				if (!res.ok) {
					this.logger.warn({ symbol, error: res.error.message, code: res.error.code }, "depth ingest failed");
				}
				return;
			}
			case "candle":
			case "order_update":
			case "trade_fill":
				this.logger.debug({ kind: event.kind, symbol }, "event observed");
				return;
		}
	}
}
