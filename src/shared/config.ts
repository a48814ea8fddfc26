/**
 * Process configuration from environment variables.
 *
 * Every variable carries the `REBALANCER_` prefix. Loading either returns a
 * complete, frozen AppConfig or throws one ConfigError naming every bad
 * variable.
 */

import { createCredentials } from "../auth/credentials.js";
import type { Credentials } from "../auth/types.js";
import type { LogLevel } from "../lib/logger/index.js";
import { z } from "../lib/validation/index.js";
import { KLINE_INTERVALS, type KlineInterval } from "../rest/exchange-client.js";
import type { StrategyMode } from "../tasks/rebalance-task.js";
import { Decimal } from "./decimal.js";
import { ConfigError } from "./errors.js";
import { type TradingSymbol, tradingSymbol } from "./identifiers.js";

export const ENV_PREFIX = "REBALANCER_";

export interface AppConfig {
	/** Null when no key pair is configured; private calls are then unavailable. */
	readonly credentials: Credentials | null;
	readonly restBaseUrl: string;
	readonly wsUrl: string;
	readonly symbol: TradingSymbol;
	readonly baseAsset: string;
	readonly quoteAsset: string;
	readonly rateLimitPerSecond: number;
	readonly recvWindowMs: number;
	readonly httpTimeoutMs: number;
	readonly priceCacheTtlMs: number;
	readonly depthCacheTtlMs: number;
	readonly lockTtlMs: number;
	/** Journal file for the permanent partition; null keeps all state in memory. */
	readonly stateFile: string | null;
	readonly maxDailyTrades: number;
	readonly minTradeIntervalMs: number;
	readonly targetRatio: Decimal;
	readonly thresholdPct: Decimal;
	readonly minNotional: Decimal;
	readonly coreRatio: Decimal;
	readonly maShort: number;
	readonly maLong: number;
	readonly klineInterval: KlineInterval;
	readonly strategyMode: StrategyMode;
	readonly dryRun: boolean;
	readonly quantityDecimals: number;
	readonly httpHost: string;
	readonly httpPort: number;
	readonly triggerSecret: string | null;
	readonly triggerBearerToken: string | null;
	readonly logLevel: LogLevel;
}

const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal"] as const;

const optionalText = z
	.string()
	.trim()
	.optional()
	.transform((v) => (v === undefined || v === "" ? null : v));

const int = (fallback: number, min: number) => z.coerce.number().int().min(min).default(fallback);

const decimal = (fallback: string, min: string, max?: string) =>
	z
		.string()
		.default(fallback)
		.transform((raw, ctx) => {
			const value = Decimal.parse(raw.trim());
			if (value === null) {
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: `"${raw}" is not a decimal number` });
				return z.NEVER;
			}
			if (value.lt(Decimal.from(min)) || (max !== undefined && value.gt(Decimal.from(max)))) {
				const range = max === undefined ? `at least ${min}` : `between ${min} and ${max}`;
				ctx.addIssue({ code: z.ZodIssueCode.custom, message: `must be ${range}` });
				return z.NEVER;
			}
			return value;
		});

const bool = (fallback: boolean) =>
	z
		.enum(["true", "false", "1", "0"])
		.default(fallback ? "true" : "false")
		.transform((v) => v === "true" || v === "1");

/** Keys are variable names without the prefix. */
const envSchema = z
	.object({
		API_KEY: optionalText,
		API_SECRET: optionalText,
		REST_BASE_URL: z.string().url().default("https://api.mexc.com"),
		WS_URL: z.string().url().default("wss://wbs-api.mexc.com/ws"),
		SYMBOL: z
			.string()
			.regex(/^[A-Z0-9]{3,}$/, "must be three or more upper-case letters and digits")
			.default("QRLUSDT"),
		BASE_ASSET: z.string().regex(/^[A-Z0-9]+$/).optional(),
		QUOTE_ASSET: z.string().regex(/^[A-Z0-9]+$/).optional(),
		RATE_LIMIT_PER_SECOND: int(10, 1),
		RECV_WINDOW_MS: z.coerce.number().int().min(1).max(60_000).default(5_000),
		HTTP_TIMEOUT_MS: int(10_000, 1),
		PRICE_CACHE_TTL_MS: int(30_000, 1),
		DEPTH_CACHE_TTL_MS: int(5_000, 1),
		LOCK_TTL_MS: int(120_000, 1),
		STATE_FILE: optionalText,
		MAX_DAILY_TRADES: int(5, 0),
		MIN_TRADE_INTERVAL_MS: int(300_000, 0),
		TARGET_RATIO: decimal("0.5", "0", "1"),
		THRESHOLD_PCT: decimal("0.01", "0", "1"),
		MIN_NOTIONAL: decimal("5", "0"),
		CORE_RATIO: decimal("0.7", "0", "1"),
		MA_SHORT: int(7, 1),
		MA_LONG: int(25, 2),
		KLINE_INTERVAL: z.enum(KLINE_INTERVALS).default("5m"),
		STRATEGY_MODE: z.enum(["symmetric", "intelligent"]).default("symmetric"),
		DRY_RUN: bool(true),
		QUANTITY_DECIMALS: z.coerce.number().int().min(0).max(18).default(2),
		HTTP_HOST: z.string().min(1).default("0.0.0.0"),
		HTTP_PORT: z.coerce.number().int().min(0).max(65_535).default(8080),
		TRIGGER_SECRET: optionalText,
		TRIGGER_BEARER_TOKEN: optionalText,
		LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
	})
	.superRefine((env, ctx) => {
		if (env.MA_SHORT >= env.MA_LONG) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["MA_SHORT"], message: "must be below MA_LONG" });
		}
		if ((env.API_KEY === null) !== (env.API_SECRET === null)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: [env.API_KEY === null ? "API_KEY" : "API_SECRET"],
				message: "API_KEY and API_SECRET must be set together",
			});
		}
	});

/** Strips the prefix; variables set to the empty string count as unset. */
function unprefixed(env: Readonly<Record<string, string | undefined>>): Record<string, string> {
	const out: Record<string, string> = {};
	for (const [key, value] of Object.entries(env)) {
		if (!key.startsWith(ENV_PREFIX) || value === undefined || value === "") continue;
		out[key.slice(ENV_PREFIX.length)] = value;
	}
	return out;
}

/**
 * Splits a symbol such as `QRLUSDT` on a known quote suffix.
 * Returns null when no suffix matches.
 */
export function splitSymbol(symbol: string): { base: string; quote: string } | null {
	for (const quote of ["USDT", "USDC", "BTC", "ETH"]) {
		if (symbol.length > quote.length && symbol.endsWith(quote)) {
			return { base: symbol.slice(0, -quote.length), quote };
		}
	}
	return null;
}

/**
 * @throws ConfigError listing every invalid variable
 * @example
 * const config = loadConfig({ REBALANCER_SYMBOL: "QRLUSDT", REBALANCER_DRY_RUN: "false" });
 */
export function loadConfig(env: Readonly<Record<string, string | undefined>> = process.env): AppConfig {
	const parsed = envSchema.safeParse(unprefixed(env));
	if (!parsed.success) {
		const problems = parsed.error.issues.map((i) => `${ENV_PREFIX}${i.path.join(".")}: ${i.message}`);
		throw new ConfigError(`Invalid configuration: ${problems.join("; ")}`, { variables: problems });
	}
	const e = parsed.data;

	const split = splitSymbol(e.SYMBOL);
	const baseAsset = e.BASE_ASSET ?? split?.base;
	const quoteAsset = e.QUOTE_ASSET ?? split?.quote;
	if (baseAsset === undefined || quoteAsset === undefined) {
		throw new ConfigError(
			`Invalid configuration: ${ENV_PREFIX}BASE_ASSET and ${ENV_PREFIX}QUOTE_ASSET are required for ${e.SYMBOL}`,
			{ symbol: e.SYMBOL },
		);
	}

	const credentials =
		e.API_KEY !== null && e.API_SECRET !== null
			? createCredentials({ apiKey: e.API_KEY, secret: e.API_SECRET })
			: null;

	return Object.freeze({
		credentials,
		restBaseUrl: e.REST_BASE_URL,
		wsUrl: e.WS_URL,
		symbol: tradingSymbol(e.SYMBOL),
		baseAsset,
		quoteAsset,
		rateLimitPerSecond: e.RATE_LIMIT_PER_SECOND,
		recvWindowMs: e.RECV_WINDOW_MS,
		httpTimeoutMs: e.HTTP_TIMEOUT_MS,
		priceCacheTtlMs: e.PRICE_CACHE_TTL_MS,
		depthCacheTtlMs: e.DEPTH_CACHE_TTL_MS,
		lockTtlMs: e.LOCK_TTL_MS,
		stateFile: e.STATE_FILE,
		maxDailyTrades: e.MAX_DAILY_TRADES,
		minTradeIntervalMs: e.MIN_TRADE_INTERVAL_MS,
		targetRatio: e.TARGET_RATIO,
		thresholdPct: e.THRESHOLD_PCT,
		minNotional: e.MIN_NOTIONAL,
		coreRatio: e.CORE_RATIO,
		maShort: e.MA_SHORT,
		maLong: e.MA_LONG,
		klineInterval: e.KLINE_INTERVAL,
		strategyMode: e.STRATEGY_MODE,
		dryRun: e.DRY_RUN,
		quantityDecimals: e.QUANTITY_DECIMALS,
		httpHost: e.HTTP_HOST,
		httpPort: e.HTTP_PORT,
		triggerSecret: e.TRIGGER_SECRET,
		triggerBearerToken: e.TRIGGER_BEARER_TOKEN,
		logLevel: e.LOG_LEVEL,
	});
}
