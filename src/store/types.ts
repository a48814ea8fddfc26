/**
 * State store contract — a string key-value store with two disjoint
 * partitions: permanent (no expiry, source of truth) and ephemeral
 * (TTL-bounded mirror and leases).
 *
 * Values are strings so that a network-backed implementation can sit behind
 * the same interface; structured values go through the JSON helpers.
 */
export interface StateStore {
	/** Reads either partition. Expired ephemeral entries read as null. */
	get(key: string): Promise<string | null>;
	/** @throws StoreError when `key` belongs to the ephemeral partition */
	setPermanent(key: string, value: string): Promise<void>;
	/** @throws StoreError when `key` belongs to the permanent partition or ttlMs <= 0 */
	setCached(key: string, value: string, ttlMs: number): Promise<void>;
	/** Atomic set-if-absent with expiry in the ephemeral partition. */
	setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean>;
	/** Atomic compare-and-delete; true when the stored value matched. */
	deleteIfEquals(key: string, expected: string): Promise<boolean>;
	delete(key: string): Promise<void>;
	/** Remaining ms for ephemeral keys; null for permanent or missing keys. */
	ttl(key: string): Promise<number | null>;
	keys(prefix: string): Promise<string[]>;
	/** Waits for pending durable writes; the store is unusable afterwards. */
	close(): Promise<void>;
}

export type Partition = "permanent" | "ephemeral";
