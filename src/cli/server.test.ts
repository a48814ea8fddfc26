import { afterEach, describe, expect, it, vi } from "vitest";
import type { TaskOutcome } from "../tasks/rebalance-task.js";
import { RebalanceAction } from "../strategy/types.js";
import { HEALTH_ROUTE, REBALANCE_ROUTE, buildTriggerServer } from "./server.js";
import type { FastifyInstance } from "fastify";

const AUTH = { secret: "test-secret", bearerToken: "test-token" };

function outcome(fields: Partial<TaskOutcome>): TaskOutcome {
	return {
		status: "hold",
		action: RebalanceAction.Hold,
		quantity: "0",
		reason: "within_threshold",
		plan: null,
		orderId: null,
		error: null,
		...fields,
	};
}

describe("buildTriggerServer", () => {
	let app: FastifyInstance | null = null;

	afterEach(async () => {
		await app?.close();
		app = null;
	});

	it("runs the task for an authorised POST", async () => {
		const run = vi.fn(async () =>
			outcome({ status: "executed", action: RebalanceAction.Sell, quantity: "25", reason: "above_target" }),
		);
		app = buildTriggerServer({ task: { run }, auth: AUTH });

		const res = await app.inject({ method: "POST", url: REBALANCE_ROUTE, headers: { "x-task-secret": "test-secret" } });

		expect(res.statusCode).toBe(200);
		expect(res.json()).toEqual({ status: "executed", action: "SELL", quantity: "25", reason: "above_target" });
		expect(run).toHaveBeenCalledTimes(1);
	});

	it("accepts a bearer token", async () => {
		app = buildTriggerServer({ task: { run: async () => outcome({}) }, auth: AUTH });

		const res = await app.inject({
			method: "POST",
			url: REBALANCE_ROUTE,
			headers: { authorization: "Bearer test-token" },
		});

		expect(res.statusCode).toBe(200);
		expect(res.json()).toEqual({ status: "hold", action: "HOLD", quantity: "0", reason: "within_threshold" });
	});

	it("refuses without credentials and never runs the task", async () => {
		const run = vi.fn(async () => outcome({}));
		app = buildTriggerServer({ task: { run }, auth: AUTH });

		const res = await app.inject({ method: "POST", url: REBALANCE_ROUTE });

		expect(res.statusCode).toBe(401);
		expect(res.json()).toEqual({ status: "error", action: null, quantity: "0", reason: "unauthorized" });
		expect(run).not.toHaveBeenCalled();
	});

	it("maps an error outcome to 500", async () => {
		app = buildTriggerServer({
			task: { run: async () => outcome({ status: "error", action: null, reason: "NETWORK_ERROR" }) },
			auth: AUTH,
		});

		const res = await app.inject({ method: "POST", url: REBALANCE_ROUTE, headers: { "x-task-secret": "test-secret" } });

		expect(res.statusCode).toBe(500);
		expect(res.json()).toEqual({ status: "error", action: null, quantity: "0", reason: "NETWORK_ERROR" });
	});

	it("answers a thrown task with a generic 500", async () => {
		app = buildTriggerServer({
			task: {
				run: async () => {
					throw new Error("boom");
				},
			},
			auth: AUTH,
		});

		const res = await app.inject({ method: "POST", url: REBALANCE_ROUTE, headers: { "x-task-secret": "test-secret" } });

		expect(res.statusCode).toBe(500);
		expect(res.json()).toEqual({ status: "error", reason: "internal_error" });
	});

	it("reports stream status on the health route", async () => {
		app = buildTriggerServer({
			task: { run: async () => outcome({}) },
			auth: AUTH,
			streamStatus: () => ({ state: "SUBSCRIBED", connections: 1 }),
		});

		const res = await app.inject({ method: "GET", url: HEALTH_ROUTE });

		expect(res.statusCode).toBe(200);
		expect(res.json()).toEqual({ status: "ok", stream: { state: "SUBSCRIBED", connections: 1 } });
	});
});
