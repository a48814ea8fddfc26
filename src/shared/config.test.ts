import { describe, expect, it } from "vitest";
import { unwrapCredentials } from "../auth/credentials.js";
import { loadConfig, splitSymbol } from "./config.js";
import { ConfigError } from "./errors.js";

function configError(env: Record<string, string>): ConfigError {
	try {
		loadConfig(env);
	} catch (error) {
		if (error instanceof ConfigError) return error;
		throw error;
	}
	throw new Error("expected loadConfig to throw");
}

describe("loadConfig", () => {
	it("fills every default from an empty environment", () => {
		const config = loadConfig({});

		expect(config.credentials).toBeNull();
		expect(config.restBaseUrl).toBe("https://api.mexc.com");
		expect(config.wsUrl).toBe("wss://wbs-api.mexc.com/ws");
		expect(config.symbol).toBe("QRLUSDT");
		expect(config.baseAsset).toBe("QRL");
		expect(config.quoteAsset).toBe("USDT");
		expect(config.rateLimitPerSecond).toBe(10);
		expect(config.recvWindowMs).toBe(5_000);
		expect(config.lockTtlMs).toBe(120_000);
		expect(config.stateFile).toBeNull();
		expect(config.maxDailyTrades).toBe(5);
		expect(config.minTradeIntervalMs).toBe(300_000);
		expect(config.targetRatio.toString()).toBe("0.5");
		expect(config.thresholdPct.toString()).toBe("0.01");
		expect(config.minNotional.toString()).toBe("5");
		expect(config.coreRatio.toString()).toBe("0.7");
		expect([config.maShort, config.maLong]).toEqual([7, 25]);
		expect(config.klineInterval).toBe("5m");
		expect(config.strategyMode).toBe("symmetric");
		expect(config.dryRun).toBe(true);
		expect(config.quantityDecimals).toBe(2);
		expect(config.httpHost).toBe("0.0.0.0");
		expect(config.httpPort).toBe(8080);
		expect(config.triggerSecret).toBeNull();
		expect(config.logLevel).toBe("info");
		expect(Object.isFrozen(config)).toBe(true);
	});

	it("reads prefixed variables only", () => {
		const config = loadConfig({
			REBALANCER_SYMBOL: "BTCUSDC",
			REBALANCER_DRY_RUN: "false",
			REBALANCER_STRATEGY_MODE: "intelligent",
			REBALANCER_TARGET_RATIO: "0.6",
			REBALANCER_KLINE_INTERVAL: "1m",
			SYMBOL: "ETHUSDT",
		});

		expect(config.symbol).toBe("BTCUSDC");
		expect(config.baseAsset).toBe("BTC");
		expect(config.quoteAsset).toBe("USDC");
		expect(config.dryRun).toBe(false);
		expect(config.strategyMode).toBe("intelligent");
		expect(config.targetRatio.toString()).toBe("0.6");
		expect(config.klineInterval).toBe("1m");
	});

	it("reads the state file and trade limits", () => {
		const config = loadConfig({
			REBALANCER_STATE_FILE: " /var/lib/rebalancer/state.jsonl ",
			REBALANCER_MAX_DAILY_TRADES: "0",
			REBALANCER_MIN_TRADE_INTERVAL_MS: "60000",
		});

		expect(config.stateFile).toBe("/var/lib/rebalancer/state.jsonl");
		expect(config.maxDailyTrades).toBe(0);
		expect(config.minTradeIntervalMs).toBe(60_000);
	});

	it("seals the key pair", () => {
		const config = loadConfig({ REBALANCER_API_KEY: "test-key", REBALANCER_API_SECRET: "test-secret" });

		expect(config.credentials).not.toBeNull();
		if (config.credentials === null) return;
		expect(unwrapCredentials(config.credentials)).toEqual({ apiKey: "test-key", secret: "test-secret" });
		expect(JSON.stringify(config)).not.toContain("test-secret");
	});

	it("treats empty variables as unset", () => {
		const config = loadConfig({ REBALANCER_API_KEY: "", REBALANCER_API_SECRET: "", REBALANCER_TRIGGER_SECRET: "" });

		expect(config.credentials).toBeNull();
		expect(config.triggerSecret).toBeNull();
	});

	it("lists every invalid variable in one error", () => {
		const error = configError({
			REBALANCER_TARGET_RATIO: "1.5",
			REBALANCER_MA_SHORT: "x",
			REBALANCER_KLINE_INTERVAL: "2m",
		});

		expect(error.code).toBe("CONFIG_ERROR");
		const variables = error.context.variables;
		expect(Array.isArray(variables) && variables.length).toBe(3);
		expect(error.message).toContain("REBALANCER_TARGET_RATIO: must be between 0 and 1");
		expect(error.message).toContain("REBALANCER_MA_SHORT:");
		expect(error.message).toContain("REBALANCER_KLINE_INTERVAL:");
	});

	it("rejects a key without its secret", () => {
		const error = configError({ REBALANCER_API_KEY: "test-key" });

		expect(error.message).toBe(
			"Invalid configuration: REBALANCER_API_SECRET: API_KEY and API_SECRET must be set together",
		);
	});

	it("requires the short average below the long one", () => {
		const error = configError({ REBALANCER_MA_SHORT: "25", REBALANCER_MA_LONG: "25" });

		expect(error.message).toBe("Invalid configuration: REBALANCER_MA_SHORT: must be below MA_LONG");
	});

	it("rejects a boolean it cannot read", () => {
		const error = configError({ REBALANCER_DRY_RUN: "yes" });

		expect(error.message).toContain("REBALANCER_DRY_RUN:");
	});

	it("needs explicit assets when the symbol has no known quote suffix", () => {
		const error = configError({ REBALANCER_SYMBOL: "QRLEUR" });
		expect(error.message).toContain("REBALANCER_BASE_ASSET and REBALANCER_QUOTE_ASSET are required for QRLEUR");

		const config = loadConfig({
			REBALANCER_SYMBOL: "QRLEUR",
			REBALANCER_BASE_ASSET: "QRL",
			REBALANCER_QUOTE_ASSET: "EUR",
		});
		expect([config.baseAsset, config.quoteAsset]).toEqual(["QRL", "EUR"]);
	});
});

describe("splitSymbol", () => {
	it("splits on the quote suffix", () => {
		expect(splitSymbol("QRLUSDT")).toEqual({ base: "QRL", quote: "USDT" });
		expect(splitSymbol("ETHBTC")).toEqual({ base: "ETH", quote: "BTC" });
	});

	it("returns null for a bare quote or an unknown suffix", () => {
		expect(splitSymbol("USDT")).toBeNull();
		expect(splitSymbol("QRLEUR")).toBeNull();
	});
});
