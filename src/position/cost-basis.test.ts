import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { InsufficientPositionError } from "../shared/errors.js";
import { unwrap } from "../shared/result.js";
import { CostBasis } from "./cost-basis.js";

const d = Decimal.from;

function accumulated(): CostBasis {
	return CostBasis.create()
		.buy({ quantity: d(100), spent: d(50), at: 1 })
		.buy({ quantity: d(100), spent: d(100), at: 2 });
}

describe("CostBasis", () => {
	it("starts flat", () => {
		const cb = CostBasis.create();
		expect(cb.quantity.isZero()).toBe(true);
		expect(cb.avgCost()).toBeNull();
		expect(cb.unrealizedPnl(d(3)).isZero()).toBe(true);
		expect(cb.updatedAt).toBeNull();
	});

	it("weights the average by quote spent", () => {
		const cb = accumulated();
		expect(cb.quantity.toString()).toBe("200");
		expect(cb.avgCost()?.toString()).toBe("0.75");
		expect(cb.invested().toString()).toBe("150");
		expect(cb.fills).toBe(2);
		expect(cb.updatedAt).toBe(2);
	});

	it("realizes PnL on a sell and keeps the average for the remainder", () => {
		const cb = unwrap(accumulated().sell({ quantity: d(50), price: d(1), at: 3 }));
		expect(cb.realizedPnl.toString()).toBe("12.5");
		expect(cb.quantity.toString()).toBe("150");
		expect(cb.avgCost()?.toString()).toBe("0.75");
		expect(cb.unrealizedPnl(d(1)).toString()).toBe("37.5");
	});

	it("goes flat after selling everything", () => {
		const partial = unwrap(accumulated().sell({ quantity: d(50), price: d(1), at: 3 }));
		const flat = unwrap(partial.sell({ quantity: d(150), price: d("0.5"), at: 4 }));
		expect(flat.realizedPnl.toString()).toBe("-25");
		expect(flat.quantity.isZero()).toBe(true);
		expect(flat.avgCost()).toBeNull();
		expect(flat.invested().isZero()).toBe(true);
	});

	it("refuses to sell more than is held", () => {
		const res = accumulated().sell({ quantity: d(201), price: d(1), at: 3 });
		expect(res.ok).toBe(false);
		if (!res.ok) {
			expect(res.error).toBeInstanceOf(InsufficientPositionError);
			expect(res.error.context).toEqual({ held: "200", requested: "201" });
		}
	});

	it("sells only the held part and reports the rest as untracked", () => {
		const held = CostBasis.create().buy({ quantity: d(10), spent: d(5), at: 1 });
		const { basis, untracked } = held.sellHeld({ quantity: d(15), price: d("0.6"), at: 2 });
		expect(untracked.toString()).toBe("5");
		expect(basis.quantity.isZero()).toBe(true);
		expect(basis.realizedPnl.toString()).toBe("1");
		expect(basis.fills).toBe(2);
	});

	it("leaves a flat basis untouched when everything sold was untracked", () => {
		const flat = CostBasis.create();
		const { basis, untracked } = flat.sellHeld({ quantity: d(3), price: d(1), at: 2 });
		expect(basis).toBe(flat);
		expect(untracked.toString()).toBe("3");
	});

	it("trims the quantity to the account balance and keeps the average", () => {
		const trimmed = accumulated().reconcile(d(120), 7);
		expect(trimmed.quantity.toString()).toBe("120");
		expect(trimmed.avgCost()?.toString()).toBe("0.75");
		expect(trimmed.updatedAt).toBe(7);
	});

	it("keeps the basis when the account holds at least the tracked quantity", () => {
		const cb = accumulated();
		expect(cb.reconcile(d(200), 7)).toBe(cb);
		expect(cb.reconcile(d(250), 7)).toBe(cb);
		expect(() => cb.reconcile(d(-1), 7)).toThrow(RangeError);
	});

	it("treats zero-quantity fills as no-ops", () => {
		const cb = accumulated();
		expect(cb.buy({ quantity: d(0), spent: d(0), at: 9 })).toBe(cb);
		expect(unwrap(cb.sell({ quantity: d(0), price: d(5), at: 9 }))).toBe(cb);
	});

	it("rejects negative fills", () => {
		expect(() => CostBasis.create().buy({ quantity: d(-1), spent: d(1), at: 0 })).toThrow(RangeError);
		expect(() => CostBasis.create().sell({ quantity: d(-1), price: d(1), at: 0 })).toThrow(RangeError);
	});

	it("restores from its snapshot", () => {
		const original = unwrap(accumulated().sell({ quantity: d(50), price: d(1), at: 3 }));
		const snapshot = original.toSnapshot();
		expect(snapshot).toEqual({ quantity: "150", avgCost: "0.75", realizedPnl: "12.5", fills: 3, updatedAt: 3 });

		const restored = CostBasis.restore(snapshot);
		expect(restored.toSnapshot()).toEqual(snapshot);
		expect(restored.avgCost()?.eq(d("0.75"))).toBe(true);
	});

	it("refuses a snapshot with a negative quantity", () => {
		expect(() =>
			CostBasis.restore({ quantity: "-1", avgCost: "1", realizedPnl: "0", fills: 1, updatedAt: 0 }),
		).toThrow(RangeError);
	});
});
