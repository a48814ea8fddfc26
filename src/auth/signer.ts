/**
 * Request signing — HMAC-SHA256 over the canonical query string.
 *
 * Canonical form: parameters sorted by key, URL-encoded, joined with "&".
 * The signature is appended last and is never itself part of the signed text.
 */

import { createHmac } from "node:crypto";
import { AuthError } from "../shared/errors.js";
import { unwrapCredentials } from "./credentials.js";
import type { Credentials } from "./types.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

/** Primitive request parameter; undefined entries are dropped before signing. */
export type ParamValue = string | number | boolean | undefined;
export type RequestParams = Readonly<Record<string, ParamValue>>;

/** A request ready for dispatch. Created per call and discarded afterwards. */
export interface SignedRequest {
	readonly method: HttpMethod;
	readonly path: string;
	/** Sorted `[key, value]` pairs, including timestamp and signature when signed. */
	readonly params: readonly (readonly [string, string])[];
	readonly signature: string | null;
	readonly timestamp: number | null;
	readonly query: string;
}

/** Sorted, stringified parameter pairs with undefined values removed. */
export function canonicalParams(params: RequestParams): [string, string][] {
	const pairs: [string, string][] = [];
	for (const [key, value] of Object.entries(params)) {
		if (value !== undefined) pairs.push([key, String(value)]);
	}
	return pairs.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

export function encodeQuery(pairs: readonly (readonly [string, string])[]): string {
	return new URLSearchParams(pairs.map(([k, v]): [string, string] => [k, v])).toString();
}

/**
 * Hex HMAC-SHA256 of `payload` keyed by the credential secret.
 * @example sign(credentials, "symbol=QRLUSDT&timestamp=1700000000000")
 */
export function sign(credentials: Credentials, payload: string): string {
	const { secret } = unwrapCredentials(credentials);
	return createHmac("sha256", secret).update(payload).digest("hex");
}

/**
 * Builds a request. Signed requests get `timestamp` (and `recvWindow` when
 * provided) injected before canonicalization, then `signature` appended.
 * @throws AuthError on a malformed path or non-positive timestamp
 */
export function buildRequest(
	method: HttpMethod,
	path: string,
	params: RequestParams,
	signing?: {
		readonly credentials: Credentials;
		readonly timestamp: number;
		readonly recvWindowMs?: number | undefined;
	},
): SignedRequest {
	if (!path.startsWith("/")) {
		throw new AuthError("Path must start with /", { path });
	}
	if (signing === undefined) {
		const pairs = canonicalParams(params);
		return { method, path, params: pairs, signature: null, timestamp: null, query: encodeQuery(pairs) };
	}

	if (!Number.isInteger(signing.timestamp) || signing.timestamp <= 0) {
		throw new AuthError("Timestamp must be a positive integer", { timestamp: signing.timestamp });
	}
	const pairs = canonicalParams({
		...params,
		recvWindow: signing.recvWindowMs,
		timestamp: signing.timestamp,
	});
	const unsigned = encodeQuery(pairs);
	const signature = sign(signing.credentials, unsigned);
	const all: [string, string][] = [...pairs, ["signature", signature]];
	return {
		method,
		path,
		params: all,
		signature,
		timestamp: signing.timestamp,
		query: `${unsigned}&signature=${signature}`,
	};
}
