/**
 * Publishes market and account facts to both partitions: the permanent key is
 * what internal logic reads, the `:cached` mirror is what external readers get.
 */

import type { Decimal } from "../shared/decimal.js";
import type { TradingSymbol } from "../shared/identifiers.js";
import { z } from "../lib/validation/index.js";
import type { ValidationError } from "../shared/errors.js";
import type { Result } from "../shared/result.js";
import { readJson, writeCachedJson, writePermanentJson } from "./json.js";
import { StoreKeys } from "./keys.js";
import type { StateStore } from "./types.js";

export interface PricePoint {
	readonly price: string;
	readonly at: number;
}

export interface BalanceEntry {
	readonly asset: string;
	readonly free: string;
	readonly locked: string;
}

export interface BalanceSheet {
	readonly balances: readonly BalanceEntry[];
	readonly updatedAt: number;
}

export interface DepthView {
	readonly version: number;
	readonly bids: readonly (readonly [string, string])[];
	readonly asks: readonly (readonly [string, string])[];
	readonly at: number;
}

const pricePointSchema = z.object({ price: z.string(), at: z.number() });

const balanceSheetSchema = z.object({
	balances: z.array(z.object({ asset: z.string(), free: z.string(), locked: z.string() })),
	updatedAt: z.number(),
});

export interface MarketStateConfig {
	readonly priceTtlMs: number;
	readonly depthTtlMs: number;
}

export class MarketState {
	private readonly store: StateStore;
	private readonly config: MarketStateConfig;

	constructor(store: StateStore, config: MarketStateConfig) {
		this.store = store;
		this.config = config;
	}

	async publishPrice(symbol: TradingSymbol, price: Decimal, at: number): Promise<void> {
		const point: PricePoint = { price: price.toString(), at };
		await writePermanentJson(this.store, StoreKeys.priceLatest(symbol), point);
		await writeCachedJson(this.store, StoreKeys.priceCached(symbol), point, this.config.priceTtlMs);
	}

	/** Latest permanent price; never the cached mirror. */
	latestPrice(symbol: TradingSymbol): Promise<Result<PricePoint | null, ValidationError>> {
		return readJson(this.store, StoreKeys.priceLatest(symbol), pricePointSchema);
	}

	async publishBalances(sheet: BalanceSheet): Promise<void> {
		await writePermanentJson(this.store, StoreKeys.accountBalance(), sheet);
	}

	/**
	 * Applies a streamed balance change to the permanent sheet. Assets not yet
	 * present are appended.
	 */
	async applyBalanceDelta(entry: BalanceEntry, at: number): Promise<void> {
		const current = await this.balances();
		const existing = current.ok && current.value !== null ? current.value.balances : [];
		const balances = existing.some((b) => b.asset === entry.asset)
			? existing.map((b) => (b.asset === entry.asset ? entry : b))
			: [...existing, entry];
		await this.publishBalances({ balances, updatedAt: at });
	}

	balances(): Promise<Result<BalanceSheet | null, ValidationError>> {
		return readJson(this.store, StoreKeys.accountBalance(), balanceSheetSchema);
	}

	async publishDepth(symbol: TradingSymbol, depth: DepthView): Promise<void> {
		await writeCachedJson(this.store, StoreKeys.depthCached(symbol), depth, this.config.depthTtlMs);
	}
}
