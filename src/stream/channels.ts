/**
 * Channel name builders. Arguments are validated so that a typo fails at the
 * call site rather than as a silent server-side rejection.
 */

import type { KlineInterval } from "../rest/exchange-client.js";
import type { TradingSymbol } from "../shared/identifiers.js";

export type PushInterval = "100ms" | "10ms";

export const STREAM_KLINE_INTERVALS = {
	"1m": "Min1",
	"5m": "Min5",
	"15m": "Min15",
	"30m": "Min30",
	"60m": "Min60",
	"4h": "Hour4",
	"1d": "Day1",
	"1W": "Week1",
	"1M": "Month1",
} as const satisfies Record<KlineInterval, string>;

export type StreamKlineInterval = (typeof STREAM_KLINE_INTERVALS)[KlineInterval];

const PRIVATE_PREFIX = "spot@private.";

function checkSymbol(symbol: TradingSymbol): TradingSymbol {
	if (!/^[A-Z0-9]{3,}$/.test(symbol)) {
		throw new RangeError(`Invalid channel symbol: ${symbol}`);
	}
	return symbol;
}

export function tradeChannel(symbol: TradingSymbol, interval: PushInterval = "100ms"): string {
	return `spot@public.aggre.deals.v3.api.pb@${interval}@${checkSymbol(symbol)}`;
}

export function klineChannel(symbol: TradingSymbol, interval: KlineInterval): string {
	return `spot@public.kline.v3.api.pb@${checkSymbol(symbol)}@${STREAM_KLINE_INTERVALS[interval]}`;
}

export function depthDiffChannel(symbol: TradingSymbol, interval: PushInterval = "100ms"): string {
	return `spot@public.aggre.depth.v3.api.pb@${interval}@${checkSymbol(symbol)}`;
}

export function bookTickerChannel(symbol: TradingSymbol, interval: PushInterval = "100ms"): string {
	return `spot@public.aggre.bookTicker.v3.api.pb@${interval}@${checkSymbol(symbol)}`;
}

export function accountChannel(): string {
	return `${PRIVATE_PREFIX}account.v3.api.pb`;
}

export function ordersChannel(): string {
	return `${PRIVATE_PREFIX}orders.v3.api.pb`;
}

export function dealsChannel(): string {
	return `${PRIVATE_PREFIX}deals.v3.api.pb`;
}

/** Private channels need a listen key on the connection URL. */
export function isPrivateChannel(channel: string): boolean {
	return channel.startsWith(PRIVATE_PREFIX);
}

/** Public market channels for one symbol. */
export function publicChannels(symbol: TradingSymbol, klineInterval: KlineInterval): string[] {
	return [
		tradeChannel(symbol),
		klineChannel(symbol, klineInterval),
		depthDiffChannel(symbol),
		bookTickerChannel(symbol),
	];
}

export function privateChannels(): string[] {
	return [accountChannel(), ordersChannel(), dealsChannel()];
}
