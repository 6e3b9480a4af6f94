/**
 * Validation wrapper: thin abstraction over Zod that returns Result<T, ValidationError>.
 *
 * Used where untrusted input enters the library (parameter objects,
 * environment configuration). Re-exports `z` so schemas are built without a
 * direct zod import elsewhere.
 */

import { z } from "zod";
import { BinomialError, ErrorKind } from "../../shared/errors.js";
import { type Result, err, ok } from "../../shared/result.js";

export { z };

/** A single validation failure with the path to the invalid field and a message. */
export interface ValidationIssue {
	readonly path: readonly (string | number)[];
	readonly message: string;
}

/** Domain error carrying one or more schema issues. */
export class ValidationError extends BinomialError {
	readonly issues: readonly ValidationIssue[];

	constructor(message: string, issues: readonly ValidationIssue[]) {
		super(message, "VALIDATION_FAILED", ErrorKind.Domain, { issueCount: issues.length });
		this.name = "ValidationError";
		this.issues = issues;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), issues: this.issues };
	}
}

/** Validate data against a Zod schema, returning a Result instead of throwing. */
export function validate<T>(
	schema: z.ZodType<T>,
	data: unknown,
	message = "Validation failed",
): Result<T, ValidationError> {
	const result = schema.safeParse(data);
	if (result.success) {
		return ok(result.data);
	}
	const issues: ValidationIssue[] = result.error.issues.map((i) => ({
		path: i.path,
		message: i.message,
	}));
	return err(new ValidationError(message, issues));
}
