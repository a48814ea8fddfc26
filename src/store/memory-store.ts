import { TtlCache } from "../lib/cache/index.js";
import { StoreError } from "../shared/errors.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { isLeaseKey, partitionOf } from "./keys.js";
import type { Partition, StateStore } from "./types.js";

export interface MemoryStateStoreConfig {
	readonly clock?: Clock;
	/** Mirror capacity; least recently used entries go first. Leases never count. */
	readonly maxCachedEntries?: number;
	readonly partitionOf?: (key: string) => Partition;
}

/**
 * In-process StateStore. Every operation completes synchronously inside its
 * promise, so set-if-absent and compare-and-delete are atomic with respect to
 * other callers on the event loop.
 *
 * Leases live in their own unbounded table: only expiry or release removes
 * them, never pressure from the cached mirrors.
 */
export class MemoryStateStore implements StateStore {
	private readonly permanent = new Map<string, string>();
	private readonly ephemeral: TtlCache<string>;
	private readonly leases: TtlCache<string>;
	private readonly partition: (key: string) => Partition;

	constructor(config: MemoryStateStoreConfig = {}) {
		const clock = config.clock ?? SystemClock;
		this.ephemeral = new TtlCache<string>({
			defaultTtlMs: 60_000,
			maxSize: config.maxCachedEntries ?? 10_000,
			clock,
		});
		this.leases = new TtlCache<string>({ defaultTtlMs: 60_000, maxSize: Number.POSITIVE_INFINITY, clock });
		this.partition = config.partitionOf ?? partitionOf;
	}

	async get(key: string): Promise<string | null> {
		return this.permanent.get(key) ?? this.tableFor(key).get(key) ?? null;
	}

	async setPermanent(key: string, value: string): Promise<void> {
		this.expectPartition(key, "permanent");
		this.permanent.set(key, value);
	}

	async setCached(key: string, value: string, ttlMs: number): Promise<void> {
		this.expectPartition(key, "ephemeral");
		this.expectTtl(key, ttlMs);
		this.tableFor(key).set(key, value, ttlMs);
	}

	async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
		this.expectPartition(key, "ephemeral");
		this.expectTtl(key, ttlMs);
		return this.tableFor(key).setIfAbsent(key, value, ttlMs);
	}

	async deleteIfEquals(key: string, expected: string): Promise<boolean> {
		if (this.permanent.get(key) === expected) {
			return this.permanent.delete(key);
		}
		const table = this.tableFor(key);
		if (table.get(key) === expected) {
			return table.delete(key);
		}
		return false;
	}

	async delete(key: string): Promise<void> {
		this.permanent.delete(key);
		this.tableFor(key).delete(key);
	}

	async ttl(key: string): Promise<number | null> {
		return this.tableFor(key).ttlRemaining(key);
	}

	async keys(prefix: string): Promise<string[]> {
		const permanent = [...this.permanent.keys()].filter((k) => k.startsWith(prefix));
		return [...permanent, ...this.ephemeral.keys(prefix), ...this.leases.keys(prefix)].sort();
	}

	/** Nothing to release in memory. */
	async close(): Promise<void> {}

	private tableFor(key: string): TtlCache<string> {
		return isLeaseKey(key) ? this.leases : this.ephemeral;
	}

	private expectPartition(key: string, expected: Partition): void {
		const actual = this.partition(key);
		if (actual !== expected) {
			throw new StoreError(`Key belongs to the ${actual} partition`, { key, expected });
		}
	}

	private expectTtl(key: string, ttlMs: number): void {
		if (!Number.isFinite(ttlMs) || ttlMs <= 0) {
			throw new StoreError("TTL must be a positive number of milliseconds", { key, ttlMs });
		}
	}
}
