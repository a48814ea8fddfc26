import type { Decimal } from "../shared/decimal.js";
import type { OrderSide } from "../shared/order-side.js";
import type { TradingSymbol } from "../shared/identifiers.js";

/** An order the exchange reports as (partly) filled. */
export interface ConfirmedFill {
	readonly side: OrderSide;
	/** Base quantity executed. */
	readonly quantity: Decimal;
	/** Quote quantity exchanged, fees excluded. */
	readonly quoteQuantity: Decimal;
	readonly at: number;
}

/** Position marked against a price; unrealized PnL is derived, never stored. */
export interface PositionView {
	readonly symbol: TradingSymbol;
	readonly quantity: Decimal;
	readonly avgCost: Decimal | null;
	readonly invested: Decimal;
	readonly realizedPnl: Decimal;
	readonly unrealizedPnl: Decimal;
	readonly markPrice: Decimal;
	readonly fills: number;
}
