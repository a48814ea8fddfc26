/**
 * PositionLedger — the permanent record of quantity and cost per symbol.
 *
 * Every mutation is a read-modify-write of `position:<symbol>`. Callers run
 * it only while holding the task lease, so there is no concurrent writer.
 */

import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { z } from "../lib/validation/index.js";
import { Decimal } from "../shared/decimal.js";
import type { ValidationError } from "../shared/errors.js";
import type { TradingSymbol } from "../shared/identifiers.js";
import { OrderSide } from "../shared/order-side.js";
import { type Result, ok } from "../shared/result.js";
import { readJson, writePermanentJson } from "../store/json.js";
import { StoreKeys } from "../store/keys.js";
import type { StateStore } from "../store/types.js";
import { CostBasis, type CostBasisSnapshot } from "./cost-basis.js";
import type { ConfirmedFill, PositionView } from "./types.js";

const decimalString = z.string().refine((s) => Decimal.parse(s) !== null, "not a decimal");

const snapshotSchema: z.ZodType<CostBasisSnapshot, z.ZodTypeDef, unknown> = z.object({
	quantity: decimalString.refine((s) => !s.trim().startsWith("-"), "negative quantity"),
	avgCost: decimalString,
	realizedPnl: decimalString,
	fills: z.number().int().nonnegative(),
	updatedAt: z.number().nullable(),
});

export interface PositionLedgerDeps {
	readonly store: StateStore;
	readonly logger?: Logger;
}

export class PositionLedger {
	private readonly store: StateStore;
	private readonly logger: Logger;

	constructor(deps: PositionLedgerDeps) {
		this.store = deps.store;
		this.logger = (deps.logger ?? silentLogger).child({ component: "ledger" });
	}

	/** Stored basis, or an empty one when the symbol has never traded. */
	async get(symbol: TradingSymbol): Promise<Result<CostBasis, ValidationError>> {
		const res = await readJson(this.store, StoreKeys.position(symbol), snapshotSchema);
		if (!res.ok) return res;
		return ok(res.value === null ? CostBasis.create() : CostBasis.restore(res.value));
	}

	/**
	 * Applies a confirmed fill. A sell's price is its average execution price,
	 * `quoteQuantity / quantity`. A fill with no executed quantity changes nothing.
	 *
	 * A sell larger than the tracked quantity realizes PnL on the tracked part
	 * only; the rest came from holdings the ledger never saw.
	 */
	async recordFill(symbol: TradingSymbol, fill: ConfirmedFill): Promise<Result<CostBasis, ValidationError>> {
		const current = await this.get(symbol);
		if (!current.ok) return current;
		if (fill.quantity.isZero()) return current;

		let next: CostBasis;
		if (fill.side === OrderSide.Buy) {
			next = current.value.buy({ quantity: fill.quantity, spent: fill.quoteQuantity, at: fill.at });
		} else {
			const price = fill.quoteQuantity.div(fill.quantity);
			const sold = current.value.sellHeld({ quantity: fill.quantity, price, at: fill.at });
			if (sold.untracked.isPositive()) {
				this.logger.warn(
					{ symbol, sold: fill.quantity.toString(), untracked: sold.untracked.toString() },
					"sell exceeds tracked quantity",
				);
			}
			next = sold.basis;
		}

		await writePermanentJson(this.store, StoreKeys.position(symbol), next.toSnapshot());
		this.logger.info(
			{
				symbol,
				side: fill.side,
				quantity: fill.quantity.toString(),
				held: next.quantity.toString(),
				avgCost: next.avgCost()?.toString() ?? null,
			},
			"fill recorded",
		);
		return ok(next);
	}

	/**
	 * Trims the tracked quantity to `held`, the account's balance of the base
	 * asset. Writes only when the stored quantity was above it.
	 */
	async reconcile(symbol: TradingSymbol, held: Decimal, at: number): Promise<Result<CostBasis, ValidationError>> {
		const current = await this.get(symbol);
		if (!current.ok) return current;
		const next = current.value.reconcile(held, at);
		if (next === current.value) return current;

		await writePermanentJson(this.store, StoreKeys.position(symbol), next.toSnapshot());
		this.logger.warn(
			{ symbol, tracked: current.value.quantity.toString(), held: held.toString() },
			"ledger trimmed to account balance",
		);
		return ok(next);
	}

	/** The position marked at `markPrice`. */
	async view(symbol: TradingSymbol, markPrice: Decimal): Promise<Result<PositionView, ValidationError>> {
		const res = await this.get(symbol);
		if (!res.ok) return res;
		const basis = res.value;
		return ok({
			symbol,
			quantity: basis.quantity,
			avgCost: basis.avgCost(),
			invested: basis.invested(),
			realizedPnl: basis.realizedPnl,
			unrealizedPnl: basis.unrealizedPnl(markPrice),
			markPrice,
			fills: basis.fills,
		});
	}
}
