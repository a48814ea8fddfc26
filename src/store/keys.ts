import type { Partition } from "./types.js";

/** Key layout shared by every writer and reader. */
export const StoreKeys = {
	exchangeRaw: (endpoint: string) => `exchange:raw:${endpoint}`,
	accountBalance: () => "account:balance",
	priceLatest: (symbol: string) => `market:price:${symbol}:latest`,
	priceCached: (symbol: string) => `market:price:${symbol}:cached`,
	depthCached: (symbol: string) => `market:depth:${symbol}:cached`,
	position: (symbol: string) => `position:${symbol}`,
	taskLock: (name: string) => `task:lock:${name}`,
	session: () => "session:listen-key",
	rebalancePlan: (symbol: string) => `rebalance:plan:${symbol}:latest`,
	/** `day` is the UTC date, `YYYY-MM-DD`. */
	tradesDaily: (symbol: string, day: string) => `trades:daily:${symbol}:${day}`,
	tradesLast: (symbol: string) => `trades:last:${symbol}`,
	tradesHistory: (symbol: string) => `trades:history:${symbol}`,
} as const;

/** Lease keys; the memory store keeps them apart from the evictable mirrors. */
export function isLeaseKey(key: string): boolean {
	return key.startsWith("task:lock:");
}

/** `*:cached` mirrors and `task:lock:*` leases expire; everything else is permanent. */
export function partitionOf(key: string): Partition {
	return key.endsWith(":cached") || isLeaseKey(key) ? "ephemeral" : "permanent";
}
