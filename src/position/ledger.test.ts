import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { tradingSymbol } from "../shared/identifiers.js";
import { OrderSide } from "../shared/order-side.js";
import { StoreKeys } from "../store/keys.js";
import { MemoryStateStore } from "../store/memory-store.js";
import { PositionLedger } from "./ledger.js";

const d = Decimal.from;
const symbol = tradingSymbol("QRLUSDT");

function setup() {
	const store = new MemoryStateStore();
	return { store, ledger: new PositionLedger({ store }) };
}

describe("PositionLedger", () => {
	it("returns an empty basis for a symbol that never traded", async () => {
		const { ledger } = setup();
		const res = await ledger.get(symbol);
		expect(res.ok && res.value.quantity.isZero()).toBe(true);
	});

	it("persists buys permanently under the position key", async () => {
		const { store, ledger } = setup();
		await ledger.recordFill(symbol, { side: OrderSide.Buy, quantity: d(100), quoteQuantity: d(25), at: 10 });

		expect(JSON.parse((await store.get(StoreKeys.position(symbol))) ?? "null")).toEqual({
			quantity: "100",
			avgCost: "0.25",
			realizedPnl: "0",
			fills: 1,
			updatedAt: 10,
		});
		expect(await store.ttl(StoreKeys.position(symbol))).toBeNull();
	});

	it("prices a sell at its average execution price", async () => {
		const { ledger } = setup();
		await ledger.recordFill(symbol, { side: OrderSide.Buy, quantity: d(100), quoteQuantity: d(25), at: 10 });
		const res = await ledger.recordFill(symbol, {
			side: OrderSide.Sell,
			quantity: d(40),
			quoteQuantity: d(12),
			at: 20,
		});

		expect(res.ok).toBe(true);
		const basis = await ledger.get(symbol);
		if (!basis.ok) throw basis.error;
		expect(basis.value.quantity.toString()).toBe("60");
		expect(basis.value.realizedPnl.toString()).toBe("2");
		expect(basis.value.avgCost()?.toString()).toBe("0.25");
	});

	it("realizes a sell beyond the tracked quantity on the tracked part only", async () => {
		const { ledger } = setup();
		await ledger.recordFill(symbol, { side: OrderSide.Buy, quantity: d(10), quoteQuantity: d(5), at: 1 });

		const res = await ledger.recordFill(symbol, { side: OrderSide.Sell, quantity: d(15), quoteQuantity: d(9), at: 2 });

		if (!res.ok) throw res.error;
		expect(res.value.quantity.isZero()).toBe(true);
		expect(res.value.realizedPnl.toString()).toBe("1");
		expect(res.value.avgCost()).toBeNull();
	});

	it("trims the stored position to the account balance", async () => {
		const { store, ledger } = setup();
		await ledger.recordFill(symbol, { side: OrderSide.Buy, quantity: d(100), quoteQuantity: d(25), at: 10 });

		const res = await ledger.reconcile(symbol, d(40), 30);

		if (!res.ok) throw res.error;
		expect(JSON.parse((await store.get(StoreKeys.position(symbol))) ?? "null")).toEqual({
			quantity: "40",
			avgCost: "0.25",
			realizedPnl: "0",
			fills: 1,
			updatedAt: 30,
		});
	});

	it("does not write when the account holds more than is tracked", async () => {
		const { store, ledger } = setup();
		await ledger.recordFill(symbol, { side: OrderSide.Buy, quantity: d(100), quoteQuantity: d(25), at: 10 });
		const before = await store.get(StoreKeys.position(symbol));

		await ledger.reconcile(symbol, d(150), 30);

		expect(await store.get(StoreKeys.position(symbol))).toBe(before);
	});

	it("ignores fills with nothing executed", async () => {
		const { store, ledger } = setup();
		const res = await ledger.recordFill(symbol, { side: OrderSide.Sell, quantity: d(0), quoteQuantity: d(0), at: 1 });
		expect(res.ok).toBe(true);
		expect(await store.get(StoreKeys.position(symbol))).toBeNull();
	});

	it("marks the position to a price", async () => {
		const { ledger } = setup();
		await ledger.recordFill(symbol, { side: OrderSide.Buy, quantity: d(100), quoteQuantity: d(25), at: 10 });

		const res = await ledger.view(symbol, d("0.3"));
		if (!res.ok) throw res.error;
		expect(res.value.unrealizedPnl.toString()).toBe("5");
		expect(res.value.invested.toString()).toBe("25");
		expect(res.value.fills).toBe(1);
	});

	it("reports a corrupt stored position as a validation error", async () => {
		const { store, ledger } = setup();
		await store.setPermanent(StoreKeys.position(symbol), JSON.stringify({ quantity: "-3" }));

		const res = await ledger.get(symbol);
		expect(res.ok).toBe(false);
		if (!res.ok) expect(res.error.code).toBe("VALIDATION_FAILED");
	});
});
