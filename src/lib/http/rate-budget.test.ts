import { describe, expect, it } from "vitest";
import { ConfigError } from "../../shared/errors.js";
import { FakeClock } from "../../shared/time.js";
import { RateBudget } from "./rate-budget.js";

describe("RateBudget", () => {
	function createBudget(maxCalls = 3, windowMs = 1000) {
		const clock = new FakeClock(10_000);
		const sleeps: number[] = [];
		const budget = new RateBudget({
			maxCalls,
			windowMs,
			clock,
			sleep: async (ms) => {
				sleeps.push(ms);
				clock.advance(ms);
			},
		});
		return { budget, clock, sleeps };
	}

	it("admits up to maxCalls within the window", () => {
		const { budget } = createBudget(3);
		expect(budget.tryAcquire()).toBe(true);
		expect(budget.tryAcquire()).toBe(true);
		expect(budget.tryAcquire()).toBe(true);
		expect(budget.tryAcquire()).toBe(false);
		expect(budget.available()).toBe(0);
	});

	it("frees a slot once the oldest grant leaves the window", () => {
		const { budget, clock } = createBudget(2);
		budget.tryAcquire();
		clock.advance(400);
		budget.tryAcquire();

		clock.advance(599);
		expect(budget.tryAcquire()).toBe(false);
		clock.advance(1);
		expect(budget.tryAcquire()).toBe(true);
		expect(budget.available()).toBe(0);
	});

	it("reports time until the next slot", () => {
		const { budget, clock } = createBudget(1);
		expect(budget.timeUntilNextSlotMs()).toBe(0);
		budget.tryAcquire();
		clock.advance(300);
		expect(budget.timeUntilNextSlotMs()).toBe(700);
	});

	it("waitForSlot blocks rather than dropping the call", async () => {
		const { budget, clock, sleeps } = createBudget(2);
		budget.tryAcquire();
		budget.tryAcquire();

		await expect(budget.waitForSlot()).resolves.toBe(true);
		expect(sleeps).toEqual([1000]);
		expect(clock.now()).toBe(11_000);
		expect(budget.getStats()).toEqual({ granted: 3, waits: 1, avgWaitMs: 1000 });
	});

	it("serves every queued caller eventually", async () => {
		const { budget } = createBudget(1);
		const results = await Promise.all([
			budget.waitForSlot(),
			budget.waitForSlot(),
			budget.waitForSlot(),
		]);
		expect(results).toEqual([true, true, true]);
		expect(budget.getStats().granted).toBe(3);
	});

	it("returns false when aborted while waiting", async () => {
		const clock = new FakeClock(0);
		const controller = new AbortController();
		const budget = new RateBudget({
			maxCalls: 1,
			windowMs: 1000,
			clock,
			sleep: async () => {
				controller.abort();
			},
		});
		budget.tryAcquire();
		await expect(budget.waitForSlot(controller.signal)).resolves.toBe(false);
	});

	it("perSecond builds a one-second window", () => {
		const clock = new FakeClock(0);
		const budget = RateBudget.perSecond(10, clock);
		expect(budget.available()).toBe(10);
	});

	it("rejects invalid configuration", () => {
		const clock = new FakeClock(0);
		expect(() => new RateBudget({ maxCalls: 0, windowMs: 1000, clock })).toThrow(ConfigError);
		expect(() => new RateBudget({ maxCalls: 1, windowMs: 0, clock })).toThrow(ConfigError);
	});
});
