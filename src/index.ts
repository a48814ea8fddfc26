// ── Shared Kernel ────────────────────────────────────────────────────
export * from "./shared/index.js";

// ── Library Wrappers ─────────────────────────────────────────────────
export { type Logger, type LoggerConfig, type LogLevel, createLogger, silentLogger } from "./lib/logger/index.js";
export { type Schema, validate } from "./lib/validation/index.js";
export { TypedEmitter, type Unsubscribe } from "./lib/events/index.js";
export { RateBudget, type RateBudgetConfig, type RateBudgetStats } from "./lib/http/index.js";

// ── Auth ─────────────────────────────────────────────────────────────
export * from "./auth/index.js";

// ── REST ─────────────────────────────────────────────────────────────
export * from "./rest/index.js";

// ── Stream ───────────────────────────────────────────────────────────
export * from "./stream/index.js";

// ── Session ──────────────────────────────────────────────────────────
export * from "./session/index.js";

// ── Order Book ───────────────────────────────────────────────────────
export * from "./orderbook/index.js";

// ── State Store ──────────────────────────────────────────────────────
export * from "./store/index.js";

// ── Position ─────────────────────────────────────────────────────────
export * from "./position/index.js";

// ── Risk ─────────────────────────────────────────────────────────────
export * from "./risk/index.js";

// ── Strategy ─────────────────────────────────────────────────────────
export * from "./strategy/index.js";

// ── Tasks ────────────────────────────────────────────────────────────
export * from "./tasks/index.js";
