/**
 * Stream event model — a closed set of variants decoded at the socket
 * boundary. Consumers switch on `kind`; nothing loosely typed travels further.
 */

import type { Decimal } from "../shared/decimal.js";
import type { OrderSide } from "../shared/order-side.js";

export interface Level {
	readonly price: Decimal;
	readonly quantity: Decimal;
}

export interface TradePayload {
	readonly deals: readonly {
		readonly price: Decimal;
		readonly quantity: Decimal;
		readonly side: OrderSide | null;
		readonly time: number;
	}[];
}

export interface CandlePayload {
	readonly interval: string;
	readonly openTime: number;
	readonly closeTime: number;
	readonly open: Decimal;
	readonly high: Decimal;
	readonly low: Decimal;
	readonly close: Decimal;
	readonly volume: Decimal;
	readonly amount: Decimal;
}

export interface DepthDiffPayload {
	readonly fromVersion: number;
	readonly toVersion: number;
	readonly bids: readonly Level[];
	readonly asks: readonly Level[];
}

export interface BookTickerPayload {
	readonly bidPrice: Decimal;
	readonly bidQuantity: Decimal;
	readonly askPrice: Decimal;
	readonly askQuantity: Decimal;
}

/** Absolute balances after the change, plus the change itself. */
export interface BalanceDeltaPayload {
	readonly asset: string;
	readonly free: Decimal;
	readonly freeChange: Decimal;
	readonly locked: Decimal;
	readonly lockedChange: Decimal;
	readonly reason: string;
	readonly time: number;
}

export interface OrderUpdatePayload {
	readonly orderId: string;
	readonly clientOrderId: string;
	readonly side: OrderSide | null;
	readonly price: Decimal;
	readonly quantity: Decimal;
	readonly avgPrice: Decimal;
	readonly cumulativeQuantity: Decimal;
	readonly cumulativeAmount: Decimal;
	readonly remainQuantity: Decimal;
	readonly isMaker: boolean;
	/** Exchange status code: 1 new, 2 filled, 3 partially filled, 4 canceled, 5 partially canceled. */
	readonly status: number;
	readonly createTime: number;
}

export interface TradeFillPayload {
	readonly tradeId: string;
	readonly orderId: string;
	readonly clientOrderId: string;
	readonly side: OrderSide | null;
	readonly price: Decimal;
	readonly quantity: Decimal;
	readonly amount: Decimal;
	readonly feeAmount: Decimal;
	readonly feeCurrency: string;
	readonly isMaker: boolean;
	readonly isSelfTrade: boolean;
	readonly time: number;
}

interface Envelope<K extends string, P> {
	readonly kind: K;
	readonly channel: string;
	readonly symbol: string | null;
	/** Local clock at decode time. */
	readonly receivedAt: number;
	/** Exchange send time, when present. */
	readonly sentAt: number | null;
	readonly payload: P;
}

export type TradeEvent = Envelope<"trade", TradePayload>;
export type CandleEvent = Envelope<"candle", CandlePayload>;
export type DepthDiffEvent = Envelope<"depth_diff", DepthDiffPayload>;
export type BookTickerEvent = Envelope<"book_ticker", BookTickerPayload>;
export type BalanceDeltaEvent = Envelope<"account_balance_delta", BalanceDeltaPayload>;
export type OrderUpdateEvent = Envelope<"order_update", OrderUpdatePayload>;
export type TradeFillEvent = Envelope<"trade_fill", TradeFillPayload>;

export type StreamEvent =
	| TradeEvent
	| CandleEvent
	| DepthDiffEvent
	| BookTickerEvent
	| BalanceDeltaEvent
	| OrderUpdateEvent
	| TradeFillEvent;

export type StreamEventKind = StreamEvent["kind"];
