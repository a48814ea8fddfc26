/**
 * Branded identifiers — prevent mixing a symbol with an order id or a listen key.
 */

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

/** Exchange pair symbol, upper-case with separators removed ("QRLUSDT"). */
export type TradingSymbol = Brand<string, "TradingSymbol">;
/** Exchange-assigned order identifier. */
export type OrderId = Brand<string, "OrderId">;
/** Session token authorizing the private stream. */
export type ListenKey = Brand<string, "ListenKey">;

function branded<B extends string>(value: string, label: B): Brand<string, B> {
	const trimmed = value.trim();
	if (trimmed.length === 0) {
		throw new Error(`${label} cannot be empty`);
	}
	return trimmed as Brand<string, B>;
}

/**
 * Normalizes "qrl/usdt", "QRL-USDT" and "qrl_usdt" to "QRLUSDT".
 * @throws Error when fewer than three characters remain
 */
export function tradingSymbol(value: string): TradingSymbol {
	const normalized = value.trim().toUpperCase().replace(/[/_-]/g, "");
	if (normalized.length < 3) {
		throw new Error(`Invalid symbol: ${value}`);
	}
	return normalized as TradingSymbol;
}

export function orderId(value: string): OrderId {
	return branded(value, "OrderId");
}

export function listenKey(value: string): ListenKey {
	return branded(value, "ListenKey");
}

/** Masks a listen key for logs: first four characters only. */
export function maskListenKey(key: ListenKey): string {
	return `${key.slice(0, 4)}…`;
}
