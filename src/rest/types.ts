import type { HttpMethod, RequestParams } from "../auth/signer.js";
import type { Schema } from "../lib/validation/index.js";

/** Minimal slice of the fetch Response that the gateway reads. */
export interface HttpResponse {
	readonly status: number;
	readonly headers: { get(name: string): string | null };
	text(): Promise<string>;
}

export interface HttpRequestInit {
	readonly method: HttpMethod;
	readonly headers: Record<string, string>;
	readonly signal: AbortSignal;
}

/** Injectable HTTP transport; the global fetch satisfies it. */
export type HttpTransport = (url: string, init: HttpRequestInit) => Promise<HttpResponse>;

export interface DispatchOptions<T> {
	readonly signed: boolean;
	readonly schema: Schema<T>;
	/** Short endpoint name for logs and the raw audit key, e.g. "account". */
	readonly endpoint: string;
	/**
	 * False for calls that must not be sent twice, such as order placement.
	 * Only answers proving the exchange refused the request (429, a rejected
	 * timestamp) are retried then. Default true.
	 */
	readonly idempotent?: boolean;
}

export interface RetryConfig {
	/** Total attempts for transient failures, including the first. */
	readonly maxAttempts: number;
	readonly baseDelayMs: number;
	readonly maxDelayMs: number;
	readonly jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
	maxAttempts: 4,
	baseDelayMs: 250,
	maxDelayMs: 8_000,
	jitterFactor: 0.2,
};

export type { HttpMethod, RequestParams };
