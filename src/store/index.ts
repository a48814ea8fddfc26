export type { Partition, StateStore } from "./types.js";
export { StoreKeys, isLeaseKey, partitionOf } from "./keys.js";
export { MemoryStateStore, type MemoryStateStoreConfig } from "./memory-store.js";
export { type CorruptLine, FileStateStore, type FileStateStoreConfig } from "./file-store.js";
export { readJson, writeCachedJson, writePermanentJson } from "./json.js";
export { type LeaseOutcome, type TaskLease, TaskLock, type TaskLockDeps } from "./task-lock.js";
export {
	type BalanceEntry,
	type BalanceSheet,
	type DepthView,
	MarketState,
	type MarketStateConfig,
	type PricePoint,
} from "./market-state.js";
