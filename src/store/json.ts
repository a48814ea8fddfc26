import { validate } from "../lib/validation/index.js";
import type { Schema } from "../lib/validation/index.js";
import { ValidationError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { StateStore } from "./types.js";

/**
 * Reads and validates a JSON value. Missing keys yield ok(null); unparsable
 * or off-schema values yield a ValidationError naming the key.
 */
export async function readJson<T>(
	store: StateStore,
	key: string,
	schema: Schema<T>,
): Promise<Result<T | null, ValidationError>> {
	const raw = await store.get(key);
	if (raw === null) return ok(null);
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (cause) {
		return err(new ValidationError("Stored value is not JSON", [], { key, cause }));
	}
	return validate(schema, parsed, { key });
}

export function writePermanentJson(store: StateStore, key: string, value: unknown): Promise<void> {
	return store.setPermanent(key, JSON.stringify(value));
}

export function writeCachedJson(
	store: StateStore,
	key: string,
	value: unknown,
	ttlMs: number,
): Promise<void> {
	return store.setCached(key, JSON.stringify(value), ttlMs);
}
