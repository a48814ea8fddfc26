/**
 * ExchangeError hierarchy — structured error classification.
 *
 * Every error carries a category (retryable, non-retryable, fatal) which drives
 * the gateway's retry loop and the supervisor's reconnect decisions.
 */

/** Error severity categories that drive retry behavior. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Context bag accepted by every subclass; `cause` is lifted onto `Error.cause`. */
type ErrorContext = Record<string, unknown> & { readonly cause?: unknown };

/** Base error for exchange connectivity and state operations. */
export class ExchangeError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: ErrorContext = {},
	) {
		const { cause, ...rest } = context;
		super(message);
		this.name = "ExchangeError";
		this.category = category;
		this.code = code;
		this.context = rest;
		if (cause !== undefined) this.cause = cause;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Transport ────────────────────────────────────────────────────────

/** Connection refused, reset, DNS failure. */
export class NetworkError extends ExchangeError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "NETWORK_ERROR", ErrorCategory.Retryable, context);
		this.name = "NetworkError";
	}
}

export class TimeoutError extends ExchangeError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "TIMEOUT_ERROR", ErrorCategory.Retryable, context);
		this.name = "TimeoutError";
	}
}

/** HTTP 429, or a local rate budget that could not be satisfied. */
export class RateLimitError extends ExchangeError {
	readonly retryAfterMs: number;

	constructor(message: string, retryAfterMs: number, context: ErrorContext = {}) {
		super(message, "RATE_LIMIT_ERROR", ErrorCategory.Retryable, context);
		this.name = "RateLimitError";
		this.retryAfterMs = retryAfterMs;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), retryAfterMs: this.retryAfterMs };
	}
}

/** HTTP 5xx. */
export class ServerError extends ExchangeError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "SERVER_ERROR", ErrorCategory.Retryable, context);
		this.name = "ServerError";
	}
}

// ── Request shape / credentials ──────────────────────────────────────

/** Bad signature, unknown key, or clock outside the receive window. */
export class AuthError extends ExchangeError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "AUTH_ERROR", ErrorCategory.NonRetryable, context);
		this.name = "AuthError";
	}
}

/** Any 4xx other than 401/403/429: the request itself is wrong. */
export class RequestRejectedError extends ExchangeError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "REQUEST_REJECTED", ErrorCategory.NonRetryable, context);
		this.name = "RequestRejectedError";
	}
}

/**
 * Malformed exchange payload. Retryable so the gateway re-issues the call once;
 * the context carries the endpoint and payload size, never the payload itself.
 */
export class ValidationError extends ExchangeError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[], context: ErrorContext = {}) {
		super(message, "VALIDATION_FAILED", ErrorCategory.Retryable, context);
		this.name = "ValidationError";
		this.issues = issues;
	}
}

/** A single validation failure with the path to the invalid field. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

// ── Streaming ────────────────────────────────────────────────────────

/** Binary or text frame that could not be decoded. */
export class DecodeError extends ExchangeError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "DECODE_ERROR", ErrorCategory.NonRetryable, context);
		this.name = "DecodeError";
	}
}

/** Subscribe call that would exceed the per-connection channel ceiling. */
export class SubscriptionLimitError extends ExchangeError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "SUBSCRIPTION_LIMIT", ErrorCategory.NonRetryable, context);
		this.name = "SubscriptionLimitError";
	}
}

/** Order-book diff stream skipped a version; recovered locally by re-snapshotting. */
export class ProtocolDesyncError extends ExchangeError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "PROTOCOL_DESYNC", ErrorCategory.Retryable, context);
		this.name = "ProtocolDesyncError";
	}
}

/** Listen key could not be renewed; private channels are down until a new one is issued. */
export class SessionExpiredError extends ExchangeError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "SESSION_EXPIRED", ErrorCategory.Fatal, context);
		this.name = "SessionExpiredError";
	}
}

// ── State ────────────────────────────────────────────────────────────

/** Sell larger than the held quantity. */
export class InsufficientPositionError extends ExchangeError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "INSUFFICIENT_POSITION", ErrorCategory.NonRetryable, context);
		this.name = "InsufficientPositionError";
	}
}

/** Misuse of the state store, e.g. a TTL write into the permanent partition. */
export class StoreError extends ExchangeError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "STORE_ERROR", ErrorCategory.Fatal, context);
		this.name = "StoreError";
	}
}

export class ConfigError extends ExchangeError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, context);
		this.name = "ConfigError";
	}
}

/** Unexpected internal failure. */
export class SystemError extends ExchangeError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, context);
		this.name = "SystemError";
	}
}

// ── Classification ───────────────────────────────────────────────────

const NETWORK_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "EAI_AGAIN", "EPIPE"]);

/**
 * Maps an HTTP status to the taxonomy. Returns null for 2xx/3xx.
 * @param retryAfterMs - parsed `Retry-After`, used only for 429
 */
export function errorForStatus(
	status: number,
	message: string,
	context: ErrorContext = {},
	retryAfterMs = 1_000,
): ExchangeError | null {
	if (status < 400) return null;
	if (status === 429) return new RateLimitError(message, retryAfterMs, { ...context, status });
	if (status === 401 || status === 403) return new AuthError(message, { ...context, status });
	if (status >= 500) return new ServerError(message, { ...context, status });
	return new RequestRejectedError(message, { ...context, status });
}

function ownCode(error: Error): string | undefined {
	return "code" in error && typeof error.code === "string" ? error.code : undefined;
}

/** Errno code of the error or, for fetch failures, of its cause. */
function errnoCode(error: Error): string | undefined {
	const code = ownCode(error);
	if (code !== undefined) return code;
	return error.cause instanceof Error ? ownCode(error.cause) : undefined;
}

/** Classify an unknown thrown value into the appropriate ExchangeError subtype. */
export function classifyError(error: unknown): ExchangeError {
	if (error instanceof ExchangeError) return error;
	if (error instanceof Error) {
		if (error.name === "AbortError" || error.name === "TimeoutError") {
			return new TimeoutError(error.message, { cause: error });
		}
		const code = errnoCode(error);
		if (code === "ETIMEDOUT" || code === "UND_ERR_CONNECT_TIMEOUT") {
			return new TimeoutError(error.message, { cause: error });
		}
		if (code !== undefined && NETWORK_CODES.has(code)) {
			return new NetworkError(error.message, { cause: error });
		}

		const msg = error.message.toLowerCase();
		if (msg.includes("timeout") || msg.includes("timed out")) {
			return new TimeoutError(error.message, { cause: error });
		}
		if (msg.includes("fetch failed") || msg.includes("socket hang up")) {
			return new NetworkError(error.message, { cause: error });
		}
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

export function isAuthError(e: unknown): e is AuthError {
	return e instanceof AuthError;
}

export function isRateLimitError(e: unknown): e is RateLimitError {
	return e instanceof RateLimitError;
}

export function isValidationError(e: unknown): e is ValidationError {
	return e instanceof ValidationError;
}
