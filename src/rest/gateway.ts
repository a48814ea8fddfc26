/**
 * RestGateway — signed, rate-budgeted, retrying REST dispatch.
 *
 * Every call waits for the rate budget and is signed once its slot is
 * granted, then is retried on 429, 5xx and transport failures with capped
 * exponential backoff. Other 4xx fail fast. Bodies are validated before they
 * reach callers; a malformed body is re-requested once, then surfaced with the
 * endpoint and payload size. Non-idempotent calls are retried only after a
 * 429 or a rejected timestamp, where the exchange provably did nothing.
 */

import { buildRequest } from "../auth/signer.js";
import { unwrapCredentials } from "../auth/credentials.js";
import type { Credentials } from "../auth/types.js";
import type { RateBudget } from "../lib/http/index.js";
import { silentLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import { backoffDelay } from "../shared/backoff.js";
import {
	AuthError,
	type ExchangeError,
	RateLimitError,
	ValidationError,
	classifyError,
	errorForStatus,
} from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock, sleep } from "../shared/time.js";
import { StoreKeys } from "../store/keys.js";
import type { StateStore } from "../store/types.js";
import {
	DEFAULT_RETRY_CONFIG,
	type DispatchOptions,
	type HttpMethod,
	type HttpResponse,
	type HttpTransport,
	type RequestParams,
	type RetryConfig,
} from "./types.js";

export const API_KEY_HEADER = "X-MEXC-APIKEY";

export interface RestGatewayConfig {
	readonly baseUrl: string;
	readonly rateBudget: RateBudget;
	readonly credentials?: Credentials | undefined;
	readonly clock?: Clock;
	readonly transport?: HttpTransport;
	readonly retry?: Partial<RetryConfig>;
	readonly recvWindowMs?: number;
	readonly timeoutMs?: number;
	readonly logger?: Logger;
	/** When set, every successful raw body is kept under `exchange:raw:<endpoint>`. */
	readonly audit?: StateStore | undefined;
	readonly sleep?: (ms: number) => Promise<void>;
	readonly random?: () => number;
}

const serverTimeSchema = z.object({ serverTime: z.number() });
const errorBodySchema = z.object({
	code: z.union([z.number(), z.string()]).optional(),
	msg: z.string().optional(),
});

/** Exchange codes meaning the timestamp fell outside recvWindow. */
const CLOCK_SKEW_CODES = new Set(["700003", "-1021"]);

/** Seconds or HTTP-date; null when absent or unreadable. */
export function parseRetryAfter(header: string | null, now: number): number | null {
	if (header === null) return null;
	const seconds = Number(header);
	if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
	const date = Date.parse(header);
	return Number.isNaN(date) ? null : Math.max(0, date - now);
}

/** `{code, msg}` from an error body; empty when the body is not that shape. */
function parseErrorBody(body: string): { code?: string; msg?: string } {
	let json: unknown;
	try {
		json = JSON.parse(body);
	} catch {
		return {};
	}
	const parsed = errorBodySchema.safeParse(json);
	if (!parsed.success) return {};
	return {
		...(parsed.data.code !== undefined && { code: String(parsed.data.code) }),
		...(parsed.data.msg !== undefined && { msg: parsed.data.msg }),
	};
}

type Attempt<T> =
	| { readonly kind: "ok"; readonly value: T }
	| { readonly kind: "error"; readonly error: ExchangeError; readonly clockSkew: boolean };

export class RestGateway {
	private readonly baseUrl: string;
	private readonly rateBudget: RateBudget;
	private readonly credentials: Credentials | undefined;
	private readonly clock: Clock;
	private readonly transport: HttpTransport;
	private readonly retry: RetryConfig;
	private readonly recvWindowMs: number;
	private readonly timeoutMs: number;
	private readonly logger: Logger;
	private readonly audit: StateStore | undefined;
	private readonly sleep: (ms: number) => Promise<void>;
	private readonly random: () => number;
	private offsetMs: number | null = null;

	constructor(config: RestGatewayConfig) {
		this.baseUrl = config.baseUrl.replace(/\/+$/, "");
		this.rateBudget = config.rateBudget;
		this.credentials = config.credentials;
		this.clock = config.clock ?? SystemClock;
		this.transport = config.transport ?? ((url, init) => fetch(url, init));
		this.retry = { ...DEFAULT_RETRY_CONFIG, ...config.retry };
		this.recvWindowMs = config.recvWindowMs ?? 5_000;
		this.timeoutMs = config.timeoutMs ?? 10_000;
		this.logger = (config.logger ?? silentLogger).child({ component: "rest-gateway" });
		this.audit = config.audit;
		this.sleep = config.sleep ?? ((ms) => sleep(ms));
		this.random = config.random ?? Math.random;
	}

	/** Server minus local clock, once synced. */
	get clockOffsetMs(): number | null {
		return this.offsetMs;
	}

	/**
	 * Measures the server clock offset against the midpoint of the round trip.
	 */
	async syncTime(): Promise<Result<number, ExchangeError>> {
		const sentAt = this.clock.now();
		const result = await this.dispatch(
			"GET",
			"/api/v3/time",
			{},
			{ signed: false, schema: serverTimeSchema, endpoint: "time" },
		);
		if (!result.ok) return result;
		const midpoint = sentAt + Math.round((this.clock.now() - sentAt) / 2);
		this.offsetMs = result.value.serverTime - midpoint;
		this.logger.info({ offsetMs: this.offsetMs }, "server time synced");
		return ok(this.offsetMs);
	}

	/**
	 * @example
	 * const res = await gateway.dispatch("GET", "/api/v3/account", {}, {
	 *   signed: true, schema: accountSchema, endpoint: "account",
	 * });
	 */
	async dispatch<T>(
		method: HttpMethod,
		path: string,
		params: RequestParams,
		options: DispatchOptions<T>,
	): Promise<Result<T, ExchangeError>> {
		if (options.signed && this.offsetMs === null) {
			const synced = await this.syncTime();
			if (!synced.ok) return synced;
		}

		const idempotent = options.idempotent ?? true;
		let transientFailures = 0;
		let validationRetried = false;
		let resynced = false;

		for (;;) {
			const attempt = await this.attempt(method, path, params, options);
			if (attempt.kind === "ok") return ok(attempt.value);
			const { error } = attempt;

			if (attempt.clockSkew && options.signed && !resynced) {
				resynced = true;
				this.logger.warn({ endpoint: options.endpoint }, "timestamp rejected, resyncing clock");
				const synced = await this.syncTime();
				if (!synced.ok) return synced;
				continue;
			}

			if (error instanceof ValidationError) {
				if (validationRetried || !idempotent) return err(error);
				validationRetried = true;
				this.logger.warn(
					{ endpoint: options.endpoint, payloadBytes: error.context.payloadBytes },
					"malformed response, retrying once",
				);
				continue;
			}

			if (!error.isRetryable) return err(error);
			if (!idempotent && !(error instanceof RateLimitError)) {
				this.logger.warn(
					{ endpoint: options.endpoint, code: error.code },
					"outcome unknown; not resending a non-idempotent call",
				);
				return err(error);
			}

			transientFailures++;
			if (transientFailures >= this.retry.maxAttempts) {
				this.logger.error(
					{ endpoint: options.endpoint, attempts: transientFailures, code: error.code },
					"retries exhausted",
				);
				return err(error);
			}

			const delayMs = this.delayFor(transientFailures - 1, error);
			this.logger.warn(
				{ endpoint: options.endpoint, attempt: transientFailures, delayMs, code: error.code },
				"transient failure, backing off",
			);
			await this.sleep(delayMs);
		}
	}

	private delayFor(retryIndex: number, error: ExchangeError): number {
		const backoff = backoffDelay(retryIndex, this.retry, this.random);
		return error instanceof RateLimitError ? Math.max(backoff, error.retryAfterMs) : backoff;
	}

	private async attempt<T>(
		method: HttpMethod,
		path: string,
		params: RequestParams,
		options: DispatchOptions<T>,
	): Promise<Attempt<T>> {
		await this.rateBudget.waitForSlot();

		const headers: Record<string, string> = { "Content-Type": "application/json" };
		let query: string;
		try {
			if (options.signed) {
				if (this.credentials === undefined) {
					throw new AuthError("Signed endpoint called without credentials", {
						endpoint: options.endpoint,
					});
				}
				headers[API_KEY_HEADER] = unwrapCredentials(this.credentials).apiKey;
				query = buildRequest(method, path, params, {
					credentials: this.credentials,
					timestamp: this.clock.now() + (this.offsetMs ?? 0),
					recvWindowMs: this.recvWindowMs,
				}).query;
			} else {
				query = buildRequest(method, path, params).query;
			}
		} catch (error) {
			return { kind: "error", error: classifyError(error), clockSkew: false };
		}

		const url = query.length > 0 ? `${this.baseUrl}${path}?${query}` : `${this.baseUrl}${path}`;
		let response: HttpResponse;
		let body: string;
		try {
			response = await this.transport(url, {
				method,
				headers,
				signal: AbortSignal.timeout(this.timeoutMs),
			});
			body = await response.text();
		} catch (error) {
			return { kind: "error", error: classifyError(error), clockSkew: false };
		}

		const context = { endpoint: options.endpoint, method, path };
		if (response.status >= 400) {
			const parsed = parseErrorBody(body);
			const retryAfterMs =
				parseRetryAfter(response.headers.get("retry-after"), this.clock.now()) ??
				this.retry.baseDelayMs;
			const error =
				errorForStatus(
					response.status,
					parsed.msg ?? `HTTP ${response.status}`,
					{ ...context, exchangeCode: parsed.code },
					retryAfterMs,
				) ?? classifyError(new Error(`HTTP ${response.status}`));
			const clockSkew = parsed.code !== undefined && CLOCK_SKEW_CODES.has(parsed.code);
			return { kind: "error", error, clockSkew };
		}

		const payloadBytes = Buffer.byteLength(body);
		let json: unknown;
		try {
			json = JSON.parse(body);
		} catch (cause) {
			return {
				kind: "error",
				error: new ValidationError("Response is not JSON", [], { ...context, payloadBytes, cause }),
				clockSkew: false,
			};
		}

		const validated = validate(options.schema, json, { ...context, payloadBytes });
		if (!validated.ok) return { kind: "error", error: validated.error, clockSkew: false };

		if (this.audit !== undefined) {
			try {
				await this.audit.setPermanent(StoreKeys.exchangeRaw(options.endpoint), body);
			} catch (error) {
				this.logger.warn({ endpoint: options.endpoint, error: String(error) }, "raw audit write failed");
			}
		}
		return { kind: "ok", value: validated.value };
	}
}
