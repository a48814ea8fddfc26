import { describe, expect, it } from "vitest";
import { tradingSymbol } from "../shared/identifiers.js";
import { OrderSide } from "../shared/order-side.js";
import { StoreKeys } from "../store/keys.js";
import { MemoryStateStore } from "../store/memory-store.js";
import { type TradeRecord, TradeJournal, utcDay } from "./trade-journal.js";

const symbol = tradingSymbol("QRLUSDT");
const DAY = 86_400_000;
// 2024-03-01T00:00:00Z
const MARCH_1 = Date.UTC(2024, 2, 1);

function trade(orderId: string, at: number): TradeRecord {
	return { orderId, side: OrderSide.Buy, quantity: "10", quoteQuantity: "2.5", reason: "below_target", at };
}

function setup(maxHistory?: number) {
	const store = new MemoryStateStore();
	const journal = new TradeJournal({ store, ...(maxHistory !== undefined && { maxHistory }) });
	return { store, journal };
}

describe("utcDay", () => {
	it("formats the UTC calendar day", () => {
		expect(utcDay(MARCH_1)).toBe("2024-03-01");
		expect(utcDay(MARCH_1 - 1)).toBe("2024-02-29");
	});
});

describe("TradeJournal", () => {
	it("reports no activity before the first trade", async () => {
		const { journal } = setup();
		expect(await journal.activity(symbol, MARCH_1)).toEqual({
			ok: true,
			value: { dailyTrades: 0, lastTradeAt: null },
		});
	});

	it("counts trades per UTC day and keeps the last trade time", async () => {
		const { journal } = setup();
		await journal.record(symbol, trade("a", MARCH_1 + 1_000));
		const res = await journal.record(symbol, trade("b", MARCH_1 + 2_000));

		expect(res).toEqual({ ok: true, value: { dailyTrades: 2, lastTradeAt: MARCH_1 + 2_000 } });
		expect(await journal.activity(symbol, MARCH_1 + 3_000)).toEqual({
			ok: true,
			value: { dailyTrades: 2, lastTradeAt: MARCH_1 + 2_000 },
		});
	});

	it("starts a fresh count on the next day and drops the old counter", async () => {
		const { store, journal } = setup();
		await journal.record(symbol, trade("a", MARCH_1 + 1_000));
		await journal.record(symbol, trade("b", MARCH_1 + DAY));

		const activity = await journal.activity(symbol, MARCH_1 + DAY + 1);
		expect(activity.ok && activity.value.dailyTrades).toBe(1);
		expect(await store.keys("trades:daily:")).toEqual(["trades:daily:QRLUSDT:2024-03-02"]);
	});

	it("keeps a capped history newest first in the permanent partition", async () => {
		const { store, journal } = setup(2);
		for (const [i, id] of ["a", "b", "c"].entries()) {
			await journal.record(symbol, trade(id, MARCH_1 + i));
		}

		const history = await journal.history(symbol);
		expect(history.ok && history.value.map((t) => t.orderId)).toEqual(["c", "b"]);
		expect(await store.ttl(StoreKeys.tradesHistory(symbol))).toBeNull();
	});

	it("reports a corrupt counter as a validation error", async () => {
		const { store, journal } = setup();
		await store.setPermanent(StoreKeys.tradesDaily(symbol, "2024-03-01"), '"many"');

		const res = await journal.activity(symbol, MARCH_1);
		expect(res.ok).toBe(false);
		if (!res.ok) expect(res.error.code).toBe("VALIDATION_FAILED");
	});
});
