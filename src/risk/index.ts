export type { GuardVerdict, TradeGuard, TradeGuardContext } from "./types.js";
export { allow, blockWithValues, isBlocked } from "./types.js";
export { CooldownGuard, DailyLimitGuard, checkAll } from "./guards.js";
export {
	type TradeActivity,
	TradeJournal,
	type TradeJournalDeps,
	type TradeRecord,
	utcDay,
} from "./trade-journal.js";
