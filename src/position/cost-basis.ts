/**
 * CostBasis — immutable weighted-average cost tracking for one symbol.
 *
 * Buys move the average: `(invested + spent) / newQuantity`. Sells realize
 * `(price - avgCost) * sold` and leave the average untouched for the rest.
 * All mutations return new instances.
 */

import { Decimal } from "../shared/decimal.js";
import { InsufficientPositionError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";

/** A confirmed buy: base quantity received for `spent` quote. */
export interface BuyFill {
	readonly quantity: Decimal;
	readonly spent: Decimal;
	readonly at: number;
}

/** A confirmed sell of `quantity` at an average execution `price`. */
export interface SellFill {
	readonly quantity: Decimal;
	readonly price: Decimal;
	readonly at: number;
}

/** Stored form; every Decimal as a string. */
export interface CostBasisSnapshot {
	readonly quantity: string;
	readonly avgCost: string;
	readonly realizedPnl: string;
	readonly fills: number;
	readonly updatedAt: number | null;
}

export class CostBasis {
	readonly quantity: Decimal;
	private readonly avg: Decimal;
	readonly realizedPnl: Decimal;
	readonly fills: number;
	readonly updatedAt: number | null;

	private constructor(
		quantity: Decimal,
		avg: Decimal,
		realizedPnl: Decimal,
		fills: number,
		updatedAt: number | null,
	) {
		this.quantity = quantity;
		this.avg = avg;
		this.realizedPnl = realizedPnl;
		this.fills = fills;
		this.updatedAt = updatedAt;
	}

	static create(): CostBasis {
		return new CostBasis(Decimal.zero(), Decimal.zero(), Decimal.zero(), 0, null);
	}

	/** @throws RangeError when the snapshot holds a non-numeric or negative quantity */
	static restore(snapshot: CostBasisSnapshot): CostBasis {
		const quantity = Decimal.parse(snapshot.quantity);
		const avg = Decimal.parse(snapshot.avgCost);
		const realized = Decimal.parse(snapshot.realizedPnl);
		if (quantity === null || avg === null || realized === null || quantity.isNegative()) {
			throw new RangeError("Invalid cost basis snapshot");
		}
		return new CostBasis(quantity, avg, realized, snapshot.fills, snapshot.updatedAt);
	}

	/** Weighted-average cost, or null when flat. */
	avgCost(): Decimal | null {
		return this.quantity.isZero() ? null : this.avg;
	}

	/** Quote currently tied up in the position at cost. */
	invested(): Decimal {
		return this.avg.mul(this.quantity);
	}

	/** @returns zero when flat */
	unrealizedPnl(markPrice: Decimal): Decimal {
		if (this.quantity.isZero()) return Decimal.zero();
		return markPrice.sub(this.avg).mul(this.quantity);
	}

	/**
	 * A zero-quantity fill is a no-op.
	 * @throws RangeError on a negative quantity or spend
	 */
	buy(fill: BuyFill): CostBasis {
		if (fill.quantity.isNegative() || fill.spent.isNegative()) {
			throw new RangeError("Buy fill must not be negative");
		}
		if (fill.quantity.isZero()) return this;
		const quantity = this.quantity.add(fill.quantity);
		const avg = this.invested().add(fill.spent).div(quantity);
		return new CostBasis(quantity, avg, this.realizedPnl, this.fills + 1, fill.at);
	}

	/**
	 * Selling more than is held is refused rather than clamped. A zero-quantity
	 * fill is a no-op.
	 * @throws RangeError on a negative quantity
	 */
	sell(fill: SellFill): Result<CostBasis, InsufficientPositionError> {
		if (fill.quantity.gt(this.quantity)) {
			return err(
				new InsufficientPositionError("Sell exceeds held quantity", {
					held: this.quantity.toString(),
					requested: fill.quantity.toString(),
				}),
			);
		}
		return ok(this.sellHeld(fill).basis);
	}

	/**
	 * Sells at most the held quantity and returns the remainder as
	 * `untracked`, quantity the basis never recorded a cost for.
	 * @throws RangeError on a negative quantity
	 */
	sellHeld(fill: SellFill): { readonly basis: CostBasis; readonly untracked: Decimal } {
		if (fill.quantity.isNegative()) throw new RangeError("Sell fill must not be negative");
		const sold = Decimal.min(fill.quantity, this.quantity);
		const untracked = fill.quantity.sub(sold);
		if (sold.isZero()) return { basis: this, untracked };
		const realized = this.realizedPnl.add(fill.price.sub(this.avg).mul(sold));
		const quantity = this.quantity.sub(sold);
		const avg = quantity.isZero() ? Decimal.zero() : this.avg;
		return { basis: new CostBasis(quantity, avg, realized, this.fills + 1, fill.at), untracked };
	}

	/**
	 * Caps the tracked quantity at what the account actually holds. The average
	 * is kept; holdings above the tracked quantity stay untracked.
	 * @throws RangeError on a negative holding
	 */
	reconcile(held: Decimal, at: number): CostBasis {
		if (held.isNegative()) throw new RangeError("Held quantity must not be negative");
		if (!held.lt(this.quantity)) return this;
		const avg = held.isZero() ? Decimal.zero() : this.avg;
		return new CostBasis(held, avg, this.realizedPnl, this.fills, at);
	}

	toSnapshot(): CostBasisSnapshot {
		return {
			quantity: this.quantity.toString(),
			avgCost: this.avg.toString(),
			realizedPnl: this.realizedPnl.toString(),
			fills: this.fills,
			updatedAt: this.updatedAt,
		};
	}
}
