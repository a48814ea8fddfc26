import { describe, expect, it } from "vitest";
import { OrderSide, oppositeSide, sideFromTradeType } from "./order-side.js";

describe("OrderSide", () => {
	it("uses exchange spelling", () => {
		expect(OrderSide.Buy).toBe("BUY");
		expect(OrderSide.Sell).toBe("SELL");
	});

	it("oppositeSide flips", () => {
		expect(oppositeSide(OrderSide.Buy)).toBe(OrderSide.Sell);
		expect(oppositeSide(OrderSide.Sell)).toBe(OrderSide.Buy);
	});

	it("maps stream trade types", () => {
		expect(sideFromTradeType(1)).toBe(OrderSide.Buy);
		expect(sideFromTradeType(2)).toBe(OrderSide.Sell);
		expect(sideFromTradeType(0)).toBeNull();
	});
});
