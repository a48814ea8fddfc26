/**
 * OrderSide — spot order direction, spelled the way the exchange expects it.
 */

export const OrderSide = {
	Buy: "BUY",
	Sell: "SELL",
} as const;

export type OrderSide = (typeof OrderSide)[keyof typeof OrderSide];

export function oppositeSide(side: OrderSide): OrderSide {
	return side === OrderSide.Buy ? OrderSide.Sell : OrderSide.Buy;
}

/** Maps the stream's numeric trade type (1 buy, 2 sell). */
export function sideFromTradeType(tradeType: number): OrderSide | null {
	if (tradeType === 1) return OrderSide.Buy;
	if (tradeType === 2) return OrderSide.Sell;
	return null;
}
