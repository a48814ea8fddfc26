/**
 * ExchangeClient — typed spot endpoints over the RestGateway.
 */

import type { ExchangeError } from "../shared/errors.js";
import type { Decimal } from "../shared/decimal.js";
import { type ListenKey, type OrderId, type TradingSymbol, listenKey, orderId } from "../shared/identifiers.js";
import type { OrderSide } from "../shared/order-side.js";
import { type Result, map } from "../shared/result.js";
import type { RestGateway } from "./gateway.js";
import {
	type AccountInfo,
	type Candle,
	type DepthSnapshot,
	type OrderAck,
	type OrderStatus,
	type TickerPrice,
	accountSchema,
	depthSnapshotSchema,
	klinesSchema,
	listenKeyAckSchema,
	listenKeySchema,
	orderAckSchema,
	orderStatusSchema,
	serverTimeSchema,
	tickerPriceSchema,
} from "./schemas.js";

export const KLINE_INTERVALS = ["1m", "5m", "15m", "30m", "60m", "4h", "1d", "1W", "1M"] as const;
export type KlineInterval = (typeof KLINE_INTERVALS)[number];

/** Depth limits the exchange accepts. */
export const DEPTH_LIMITS = [5, 10, 20, 50, 100, 500, 1000, 5000] as const;
export type DepthLimit = (typeof DEPTH_LIMITS)[number];

export interface MarketOrderRequest {
	readonly symbol: TradingSymbol;
	readonly side: OrderSide;
	readonly quantity: Decimal;
	/** Sent as `newClientOrderId`; lets a caller find the order after an unknown outcome. */
	readonly clientOrderId?: string;
}

type Call<T> = Promise<Result<T, ExchangeError>>;

export class ExchangeClient {
	private readonly gateway: RestGateway;

	constructor(gateway: RestGateway) {
		this.gateway = gateway;
	}

	async serverTime(): Call<number> {
		const res = await this.gateway.dispatch("GET", "/api/v3/time", {}, {
			signed: false,
			schema: serverTimeSchema,
			endpoint: "time",
		});
		return map(res, (body) => body.serverTime);
	}

	tickerPrice(symbol: TradingSymbol): Call<TickerPrice> {
		return this.gateway.dispatch("GET", "/api/v3/ticker/price", { symbol }, {
			signed: false,
			schema: tickerPriceSchema,
			endpoint: "ticker_price",
		});
	}

	depth(symbol: TradingSymbol, limit: DepthLimit = 100): Call<DepthSnapshot> {
		return this.gateway.dispatch("GET", "/api/v3/depth", { symbol, limit }, {
			signed: false,
			schema: depthSnapshotSchema,
			endpoint: "depth",
		});
	}

	/** Oldest candle first. */
	klines(symbol: TradingSymbol, interval: KlineInterval, limit = 100): Call<Candle[]> {
		return this.gateway.dispatch("GET", "/api/v3/klines", { symbol, interval, limit }, {
			signed: false,
			schema: klinesSchema,
			endpoint: "klines",
		});
	}

	account(): Call<AccountInfo> {
		return this.gateway.dispatch("GET", "/api/v3/account", {}, {
			signed: true,
			schema: accountSchema,
			endpoint: "account",
		});
	}

	/** Sent at most once; a 5xx or timeout leaves the outcome unknown. */
	placeMarketOrder(req: MarketOrderRequest): Call<OrderAck> {
		return this.gateway.dispatch(
			"POST",
			"/api/v3/order",
			{
				symbol: req.symbol,
				side: req.side,
				type: "MARKET",
				quantity: req.quantity.toString(),
				newClientOrderId: req.clientOrderId,
			},
			{ signed: true, schema: orderAckSchema, endpoint: "order", idempotent: false },
		);
	}

	getOrder(symbol: TradingSymbol, id: OrderId): Call<OrderStatus> {
		return this.gateway.dispatch("GET", "/api/v3/order", { symbol, orderId: id }, {
			signed: true,
			schema: orderStatusSchema,
			endpoint: "order_status",
		});
	}

	/** Looks an order up by the client id it was placed with. */
	getOrderByClientId(symbol: TradingSymbol, clientOrderId: string): Call<OrderStatus> {
		return this.gateway.dispatch("GET", "/api/v3/order", { symbol, origClientOrderId: clientOrderId }, {
			signed: true,
			schema: orderStatusSchema,
			endpoint: "order_status",
		});
	}

	async createListenKey(): Call<ListenKey> {
		const res = await this.gateway.dispatch("POST", "/api/v3/userDataStream", {}, {
			signed: true,
			schema: listenKeySchema,
			endpoint: "listen_key_create",
		});
		return map(res, (body) => listenKey(body.listenKey));
	}

	async renewListenKey(key: ListenKey): Call<void> {
		const res = await this.gateway.dispatch("PUT", "/api/v3/userDataStream", { listenKey: key }, {
			signed: true,
			schema: listenKeyAckSchema,
			endpoint: "listen_key_renew",
		});
		return map(res, () => undefined);
	}

	async closeListenKey(key: ListenKey): Call<void> {
		const res = await this.gateway.dispatch("DELETE", "/api/v3/userDataStream", { listenKey: key }, {
			signed: true,
			schema: listenKeyAckSchema,
			endpoint: "listen_key_close",
		});
		return map(res, () => undefined);
	}
}

/** Convenience for callers holding a raw exchange order id. */
export function toOrderId(ack: OrderAck): OrderId {
	return orderId(ack.orderId);
}
