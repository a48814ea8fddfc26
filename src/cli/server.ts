/**
 * HTTP surface for external schedulers: one POST route per task plus a
 * health check reporting the stream state.
 */

import Fastify, { type FastifyInstance } from "fastify";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { type RunnableTask, type TriggerAuth, handleTrigger } from "../tasks/trigger.js";

export const REBALANCE_ROUTE = "/tasks/rebalance";
export const HEALTH_ROUTE = "/healthz";

export interface TriggerServerDeps {
	readonly task: RunnableTask;
	readonly auth: TriggerAuth;
	readonly logger?: Logger;
	/** Reported by the health route; omitted when no stream runs. */
	readonly streamStatus?: () => Record<string, unknown>;
}

export function buildTriggerServer(deps: TriggerServerDeps): FastifyInstance {
	const logger = (deps.logger ?? silentLogger).child({ component: "http" });
	// request logging goes through our own logger
	const app = Fastify({ logger: false });

	app.post(REBALANCE_ROUTE, async (request, reply) => {
		const response = await handleTrigger(request.headers, deps.task, deps.auth, logger);
		return reply.code(response.httpStatus).send(response.body);
	});

	app.get(HEALTH_ROUTE, async (_request, reply) => {
		return reply.send({ status: "ok", stream: deps.streamStatus?.() ?? null });
	});

	app.setErrorHandler(async (error, request, reply) => {
		logger.error({ method: request.method, url: request.url, error: error.message }, "request failed");
		return reply.code(error.statusCode ?? 500).send({ status: "error", reason: "internal_error" });
	});

	return app;
}
