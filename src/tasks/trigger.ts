/**
 * Scheduled-task trigger: authorises the caller, runs the task and shapes the
 * audit response. Framework-agnostic; an HTTP route passes its headers in.
 */

import { createHash, timingSafeEqual } from "node:crypto";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { RebalanceAction } from "../strategy/types.js";
import type { TaskOutcome, TaskStatus } from "./rebalance-task.js";

export const SECRET_HEADER = "x-task-secret";

/** Node's IncomingHttpHeaders and plain records both fit. */
export type TriggerHeaders = Readonly<Record<string, string | readonly string[] | undefined>>;

export interface TriggerAuth {
	readonly secret: string | null;
	readonly bearerToken: string | null;
}

export interface RunnableTask {
	run(): Promise<TaskOutcome>;
}

export interface TriggerBody {
	readonly status: TaskStatus;
	readonly action: RebalanceAction | null;
	readonly quantity: string;
	readonly reason: string;
}

export interface TriggerResponse {
	readonly httpStatus: number;
	readonly body: TriggerBody;
}

/** Equal-time comparison; digests first so lengths never differ. */
function safeEqual(a: string, b: string): boolean {
	const da = createHash("sha256").update(a).digest();
	const db = createHash("sha256").update(b).digest();
	return timingSafeEqual(da, db);
}

function header(headers: TriggerHeaders, name: string): string | null {
	const wanted = name.toLowerCase();
	for (const [key, value] of Object.entries(headers)) {
		if (key.toLowerCase() !== wanted || value === undefined) continue;
		return typeof value === "string" ? value : (value[0] ?? null);
	}
	return null;
}

/**
 * Accepts either the shared secret in `x-task-secret` or
 * `Authorization: Bearer <token>`. With neither configured, every call is refused.
 */
export function authorize(headers: TriggerHeaders, auth: TriggerAuth): "secret" | "bearer" | null {
	const secret = header(headers, SECRET_HEADER);
	if (auth.secret !== null && secret !== null && safeEqual(secret, auth.secret)) return "secret";

	const authorization = header(headers, "authorization");
	const match = authorization === null ? null : /^Bearer\s+(.+)$/i.exec(authorization.trim());
	const token = match?.[1];
	if (auth.bearerToken !== null && token !== undefined && safeEqual(token, auth.bearerToken)) return "bearer";
	return null;
}

const HTTP_STATUS: Readonly<Record<TaskStatus, number>> = {
	executed: 200,
	hold: 200,
	skipped: 200,
	error: 500,
};

export async function handleTrigger(
	headers: TriggerHeaders,
	task: RunnableTask,
	auth: TriggerAuth,
	logger: Logger = silentLogger,
): Promise<TriggerResponse> {
	const log = logger.child({ component: "trigger" });
	const method = authorize(headers, auth);
	if (method === null) {
		log.warn("trigger refused");
		return {
			httpStatus: 401,
			body: { status: "error", action: null, quantity: "0", reason: "unauthorized" },
		};
	}

	const outcome = await task.run();
	log.info({ auth: method, status: outcome.status, reason: outcome.reason }, "trigger handled");
	return {
		httpStatus: HTTP_STATUS[outcome.status],
		body: {
			status: outcome.status,
			action: outcome.action,
			quantity: outcome.quantity,
			reason: outcome.reason,
		},
	};
}
