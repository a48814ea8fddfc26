import { describe, expect, it } from "vitest";
import { Decimal } from "../shared/decimal.js";
import { StrategyEvaluator, intelligentPlan } from "./evaluator.js";
import { computePlan } from "./rebalance.js";
import { PlanReason, RebalanceAction, type StrategyDecision } from "./types.js";

const d = Decimal.from;
const CORE = d("0.7");

function decision(action: RebalanceAction): StrategyDecision {
	const reason =
		action === RebalanceAction.Buy
			? PlanReason.GoldenCrossBelowCost
			: action === RebalanceAction.Sell
				? PlanReason.DeathCrossAboveMargin
				: PlanReason.NoClearSignal;
	return { action, reason, signal: null, avgCost: null };
}

const sellPlan = computePlan({ base: d(100), quote: d(100) }, d(2), d("0.5"), d(5), d("0.01"));
const buyPlan = computePlan({ base: d(100), quote: d(100) }, d("0.5"), d("0.5"), d(5), d("0.01"));

describe("StrategyEvaluator", () => {
	it("keeps only the long window of closes", () => {
		const evaluator = new StrategyEvaluator({ shortPeriod: 2, longPeriod: 3 });
		for (const close of [1, 2, 3, 4, 5]) evaluator.observe(d(close));
		expect(evaluator.windowSize).toBe(3);
		// window 3,4,5: short 4.5, long 4
		expect(evaluator.signal()?.maShort.toString()).toBe("4.5");
		expect(evaluator.signal()?.maLong.toString()).toBe("4");
	});

	it("has no signal before the window fills", () => {
		const evaluator = new StrategyEvaluator();
		evaluator.seed(Array.from({ length: 24 }, () => d(1)));
		expect(evaluator.signal()).toBeNull();
		expect(evaluator.evaluate(d(1), null).reason).toBe(PlanReason.NoClearSignal);
	});

	it("buys on a seeded golden cross below cost", () => {
		const evaluator = new StrategyEvaluator();
		evaluator.seed(Array.from({ length: 30 }, (_, i) => d(i + 1)));
		expect(evaluator.windowSize).toBe(25);

		const result = evaluator.evaluate(d(20), d(25));
		expect(result.action).toBe(RebalanceAction.Buy);
		expect(result.avgCost?.toString()).toBe("25");
	});

	it("rejects a short period that is not below the long one", () => {
		expect(() => new StrategyEvaluator({ shortPeriod: 25, longPeriod: 25 })).toThrow(RangeError);
	});
});

describe("intelligentPlan", () => {
	it("keeps a buy the strategy agrees with", () => {
		const plan = intelligentPlan(buyPlan, decision(RebalanceAction.Buy), d(100), CORE);
		expect(plan.action).toBe(RebalanceAction.Buy);
		expect(plan.quantity.toString()).toBe("50");
		expect(plan.reason).toBe(PlanReason.GoldenCrossBelowCost);
	});

	it("clamps a sell to the tradeable tier", () => {
		const plan = intelligentPlan(sellPlan, decision(RebalanceAction.Sell), d(100), d("0.8"));
		expect(plan.action).toBe(RebalanceAction.Sell);
		expect(plan.quantity.toString()).toBe("20");
		expect(plan.notional.toString()).toBe("40");
		expect(plan.reason).toBe(PlanReason.DeathCrossAboveMargin);
	});

	it("leaves a sell inside the tradeable tier untouched", () => {
		const plan = intelligentPlan(sellPlan, decision(RebalanceAction.Sell), d(100), CORE);
		expect(plan.quantity.toString()).toBe("25");
	});

	it("holds when the core ratio leaves nothing to sell", () => {
		const plan = intelligentPlan(sellPlan, decision(RebalanceAction.Sell), d(100), d(1));
		expect(plan.action).toBe(RebalanceAction.Hold);
		expect(plan.reason).toBe(PlanReason.CoreProtected);
	});

	it("holds when the strategy disagrees with the plan", () => {
		const plan = intelligentPlan(sellPlan, decision(RebalanceAction.Buy), d(100), CORE);
		expect(plan.action).toBe(RebalanceAction.Hold);
		expect(plan.reason).toBe(PlanReason.NoClearSignal);
		expect(plan.quantity.isZero()).toBe(true);
		expect(plan.notional.toString()).toBe("50");
	});

	it("passes a holding plan through", () => {
		const hold = computePlan({ base: d(100), quote: d(202) }, d(2), d("0.5"), d(5), d("0.01"));
		expect(intelligentPlan(hold, decision(RebalanceAction.Buy), d(100), CORE)).toBe(hold);
	});
});
