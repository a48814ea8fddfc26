import type { Clock } from "../../shared/time.js";
import { SystemClock } from "../../shared/time.js";

export interface TtlCacheConfig {
	/** Used when set() is called without a ttl. */
	readonly defaultTtlMs: number;
	/** Least recently used entries are evicted beyond this size. */
	readonly maxSize: number;
	readonly clock?: Clock | undefined;
}

interface Entry<T> {
	readonly value: T;
	readonly expiresAt: number;
}

export interface TtlCacheStats {
	readonly hits: number;
	readonly misses: number;
	readonly expired: number;
	readonly evicted: number;
	readonly size: number;
}

/**
 * TTL cache with LRU eviction. Every entry carries an expiry; expired entries
 * are dropped lazily on read and in bulk by purgeExpired().
 *
 * Map insertion order doubles as recency order: a hit re-inserts the key.
 *
 * @example
 * ```ts
 * const cache = new TtlCache<string>({ defaultTtlMs: 30_000, maxSize: 1_000 });
 * cache.set("market:price:QRLUSDT:cached", "1.25", 5_000);
 * ```
 */
export class TtlCache<T> {
	private readonly entries = new Map<string, Entry<T>>();
	private readonly defaultTtlMs: number;
	private readonly maxSize: number;
	private readonly clock: Clock;
	private hits = 0;
	private misses = 0;
	private expired = 0;
	private evicted = 0;

	constructor(config: TtlCacheConfig) {
		this.defaultTtlMs = config.defaultTtlMs;
		this.maxSize = config.maxSize;
		this.clock = config.clock ?? SystemClock;
	}

	get(key: string): T | undefined {
		const entry = this.live(key);
		if (entry === undefined) {
			this.misses++;
			return undefined;
		}
		this.entries.delete(key);
		this.entries.set(key, entry);
		this.hits++;
		return entry.value;
	}

	has(key: string): boolean {
		return this.live(key) !== undefined;
	}

	/** @param ttlMs - must be positive; defaults to the configured TTL */
	set(key: string, value: T, ttlMs: number = this.defaultTtlMs): void {
		this.entries.delete(key);
		while (this.entries.size >= this.maxSize) {
			const oldest = this.entries.keys().next();
			if (oldest.done === true) break;
			this.entries.delete(oldest.value);
			this.evicted++;
		}
		this.entries.set(key, { value, expiresAt: this.clock.now() + ttlMs });
	}

	/**
	 * Stores only when the key is absent or expired.
	 * @returns true if this call stored the value
	 */
	setIfAbsent(key: string, value: T, ttlMs: number = this.defaultTtlMs): boolean {
		if (this.live(key) !== undefined) return false;
		this.set(key, value, ttlMs);
		return true;
	}

	/** Milliseconds until expiry, or null when absent or expired. */
	ttlRemaining(key: string): number | null {
		const entry = this.live(key);
		return entry === undefined ? null : entry.expiresAt - this.clock.now();
	}

	delete(key: string): boolean {
		return this.entries.delete(key);
	}

	/** Live keys, optionally restricted to a prefix. */
	keys(prefix = ""): string[] {
		this.purgeExpired();
		return [...this.entries.keys()].filter((k) => k.startsWith(prefix));
	}

	purgeExpired(): number {
		const now = this.clock.now();
		let removed = 0;
		for (const [key, entry] of this.entries) {
			if (now >= entry.expiresAt) {
				this.entries.delete(key);
				removed++;
			}
		}
		this.expired += removed;
		return removed;
	}

	clear(): void {
		this.entries.clear();
	}

	getStats(): TtlCacheStats {
		return {
			hits: this.hits,
			misses: this.misses,
			expired: this.expired,
			evicted: this.evicted,
			size: this.entries.size,
		};
	}

	private live(key: string): Entry<T> | undefined {
		const entry = this.entries.get(key);
		if (entry === undefined) return undefined;
		if (this.clock.now() >= entry.expiresAt) {
			this.entries.delete(key);
			this.expired++;
			return undefined;
		}
		return entry;
	}
}
