/**
 * Validation wrapper — zod schemas in, Result<T, ValidationError> out.
 *
 * Re-exports `z` so schema modules import it from here rather than from zod.
 */

import { z } from "zod";
import { ValidationError } from "../../shared/errors.js";
import type { ValidationIssue } from "../../shared/errors.js";
import { err, ok } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

export { z };

/** Schemas whose parsed output is T, whatever their input shape. */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Validates `data` against `schema`. Unknown object keys are stripped, not rejected.
 * @param context - attached to the error (endpoint, payload size); never the payload
 */
export function validate<T>(
	schema: Schema<T>,
	data: unknown,
	context: Record<string, unknown> = {},
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path,
		message: i.message,
	}));
	return err(new ValidationError("Validation failed", issues, context));
}
