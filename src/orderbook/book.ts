import { Decimal } from "../shared/decimal.js";
import type { TradingSymbol } from "../shared/identifiers.js";
import type { DepthView } from "../store/market-state.js";
import type { Level } from "../stream/types.js";

/**
 * Local price ladder. Bids are sorted high to low, asks low to high; `version`
 * is the exchange sequence number the ladder reflects.
 */
export interface OrderBook {
	readonly symbol: TradingSymbol;
	readonly version: number;
	readonly bids: readonly Level[];
	readonly asks: readonly Level[];
	readonly updatedAt: number;
}

/** Versioned level changes; quantities are absolute, zero removes the level. */
export interface BookDiff {
	readonly fromVersion: number;
	readonly toVersion: number;
	readonly bids: readonly Level[];
	readonly asks: readonly Level[];
}

export type DiffStep =
	| { readonly kind: "applied"; readonly book: OrderBook }
	| { readonly kind: "stale" }
	| { readonly kind: "gap"; readonly expected: number; readonly received: number };

/**
 * Builds a ladder from a REST snapshot. Zero-quantity levels are dropped.
 * @example
 * const book = bookFromSnapshot(symbol, 1200, snapshot.bids, snapshot.asks, clock.now());
 */
export function bookFromSnapshot(
	symbol: TradingSymbol,
	version: number,
	bids: readonly Level[],
	asks: readonly Level[],
	at: number,
): OrderBook {
	return {
		symbol,
		version,
		bids: mergeLevels([], bids, "desc"),
		asks: mergeLevels([], asks, "asc"),
		updatedAt: at,
	};
}

/**
 * Classifies and, when in sequence, applies one diff.
 *
 * - `toVersion < version`: stale, ignored
 * - `fromVersion > version + 1`: gap, the ladder can no longer be trusted
 * - otherwise applied, and the result's version is `toVersion`
 */
export function stepDiff(book: OrderBook, diff: BookDiff, at: number): DiffStep {
	if (diff.toVersion < book.version) return { kind: "stale" };
	if (diff.fromVersion > book.version + 1) {
		return { kind: "gap", expected: book.version + 1, received: diff.fromVersion };
	}
	return {
		kind: "applied",
		book: {
			symbol: book.symbol,
			version: diff.toVersion,
			bids: mergeLevels(book.bids, diff.bids, "desc"),
			asks: mergeLevels(book.asks, diff.asks, "asc"),
			updatedAt: at,
		},
	};
}

function mergeLevels(
	existing: readonly Level[],
	updates: readonly Level[],
	direction: "asc" | "desc",
): Level[] {
	const map = new Map<string, Level>();
	for (const lvl of existing) {
		map.set(lvl.price.toString(), lvl);
	}
	for (const lvl of updates) {
		if (lvl.quantity.isZero()) {
			map.delete(lvl.price.toString());
		} else {
			map.set(lvl.price.toString(), lvl);
		}
	}
	const sorted = [...map.values()];
	sorted.sort((a, b) => {
		if (direction === "desc") {
			return a.price.gt(b.price) ? -1 : a.price.lt(b.price) ? 1 : 0;
		}
		return a.price.lt(b.price) ? -1 : a.price.gt(b.price) ? 1 : 0;
	});
	return sorted;
}

export function bestBid(book: OrderBook): Decimal | null {
	return book.bids[0]?.price ?? null;
}

export function bestAsk(book: OrderBook): Decimal | null {
	return book.asks[0]?.price ?? null;
}

/** Null when either side is empty. */
export function spread(book: OrderBook): Decimal | null {
	const bid = bestBid(book);
	const ask = bestAsk(book);
	if (bid === null || ask === null) return null;
	return ask.sub(bid);
}

export function midPrice(book: OrderBook): Decimal | null {
	const bid = bestBid(book);
	const ask = bestAsk(book);
	if (bid === null || ask === null) return null;
	return bid.add(ask).div(Decimal.from(2));
}

/** Top `levels` of each side as string pairs, the shape external readers get. */
export function toDepthView(book: OrderBook, levels = 20): DepthView {
	const pairs = (side: readonly Level[]) =>
		side.slice(0, levels).map((l): readonly [string, string] => [l.price.toString(), l.quantity.toString()]);
	return { version: book.version, bids: pairs(book.bids), asks: pairs(book.asks), at: book.updatedAt };
}
