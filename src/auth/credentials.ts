/**
 * Opaque credential container — secrets never leak through toString,
 * JSON.stringify, or Node.js inspect.
 */

import { inspect } from "node:util";
import { AuthError } from "../shared/errors.js";
import type { ApiKeySet, Credentials } from "./types.js";

const REDACTED = "[REDACTED]";
const store = new WeakMap<Credentials, ApiKeySet>();

/**
 * Seals an API key set. Keys are trimmed; empty values are rejected.
 * @throws AuthError when the key or secret is blank
 * @example
 * const credentials = createCredentials({ apiKey: "k", secret: "s" });
 * String(credentials); // "[REDACTED]"
 */
export function createCredentials(keys: ApiKeySet): Credentials {
	const apiKey = keys.apiKey.trim();
	const secret = keys.secret.trim();
	if (apiKey.length === 0 || secret.length === 0) {
		throw new AuthError("API key and secret must both be non-empty");
	}

	const sealed = Object.freeze({
		__opaque: true as const,
		toString: () => REDACTED,
		toJSON: () => REDACTED,
		[inspect.custom]: () => REDACTED,
	});
	store.set(sealed, { apiKey, secret });
	return sealed;
}

/** @throws AuthError if the handle was not produced by createCredentials() */
export function unwrapCredentials(credentials: Credentials): ApiKeySet {
	const keys = store.get(credentials);
	if (!keys) {
		throw new AuthError("Invalid credentials object");
	}
	return { ...keys };
}
