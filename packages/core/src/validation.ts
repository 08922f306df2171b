/**
 * Runtime validation for settings files, command-line values and
 * other untyped input, built with a small fluent API.
 */

import { ToroidError } from "./errors.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type ValidatorFn<T = unknown> = (value: unknown) => { valid: boolean; error?: string; value?: T };

// ─── Validator Classes ───────────────────────────────────────────────────────

class NumberValidator {
	private minVal?: number;
	private maxVal?: number;
	private intOnly = false;

	min(n: number): this {
		this.minVal = n;
		return this;
	}

	max(n: number): this {
		this.maxVal = n;
		return this;
	}

	integer(): this {
		this.intOnly = true;
		return this;
	}

	validate: ValidatorFn<number> = (value: unknown) => {
		if (typeof value !== "number" || Number.isNaN(value)) {
			return { valid: false, error: `Expected number, received ${typeof value}` };
		}
		if (this.intOnly && !Number.isInteger(value)) {
			return { valid: false, error: `Expected integer, received ${value}` };
		}
		if (this.minVal !== undefined && value < this.minVal) {
			return { valid: false, error: `Number ${value} is below minimum ${this.minVal}` };
		}
		if (this.maxVal !== undefined && value > this.maxVal) {
			return { valid: false, error: `Number ${value} exceeds maximum ${this.maxVal}` };
		}
		return { valid: true, value };
	};
}

type InferSchema<T extends Record<string, ValidatorFn>> = {
	[K in keyof T]: T[K] extends ValidatorFn<infer U> ? U : unknown;
};

class ObjectValidator<T extends Record<string, ValidatorFn>> {
	constructor(private schema: T) {}

	validate: ValidatorFn<InferSchema<T>> = (value: unknown) => {
		if (typeof value !== "object" || value === null || Array.isArray(value)) {
			return { valid: false, error: `Expected object, received ${value === null ? "null" : typeof value}` };
		}
		const obj = new Map(Object.entries(value));
		const result: Record<string, unknown> = {};
		const errors: string[] = [];

		for (const [key, validator] of Object.entries(this.schema)) {
			const fieldResult = validator(obj.get(key));
			if (!fieldResult.valid) {
				errors.push(`${key}: ${fieldResult.error}`);
			} else {
				result[key] = fieldResult.value;
			}
		}

		if (errors.length > 0) {
			return { valid: false, error: errors.join("; ") };
		}
		// Every schema key was checked by its own validator above.
		return { valid: true, value: result as InferSchema<T> };
	};
}

class OptionalValidator<T> {
	constructor(private inner: ValidatorFn<T>) {}

	validate: ValidatorFn<T | undefined> = (value: unknown) => {
		if (value === undefined || value === null) {
			return { valid: true, value: undefined };
		}
		return this.inner(value);
	};
}

class UnionValidator<T> {
	constructor(private validators: ValidatorFn<T>[]) {}

	validate: ValidatorFn<T> = (value: unknown) => {
		const errors: string[] = [];
		for (const validator of this.validators) {
			const result = validator(value);
			if (result.valid) {
				return result;
			}
			if (result.error) {
				errors.push(result.error);
			}
		}
		return {
			valid: false,
			error: `Value did not match any variant: ${errors.join(" | ")}`,
		};
	};
}

class LiteralValidator<T extends string | number | boolean> {
	constructor(private expected: T) {}

	validate: ValidatorFn<T> = (value: unknown) => {
		if (value !== this.expected) {
			return { valid: false, error: `Expected literal ${JSON.stringify(this.expected)}, received ${JSON.stringify(value)}` };
		}
		return { valid: true, value: this.expected };
	};
}

// ─── Fluent Builder ──────────────────────────────────────────────────────────

/**
 * Fluent validator builders.
 *
 * Usage:
 * ```ts
 * const sizeV = v.number().integer().min(1).validate;
 * const settingsV = v.object({
 *   width: sizeV,
 *   height: sizeV,
 *   seed: v.optional(v.number().integer().validate).validate,
 * }).validate;
 * ```
 */
export const v = {
	number: () => new NumberValidator(),
	object: <T extends Record<string, ValidatorFn>>(schema: T) => new ObjectValidator<T>(schema),
	optional: <T>(validator: ValidatorFn<T>) => new OptionalValidator<T>(validator),
	union: <T>(...validators: ValidatorFn<T>[]) => new UnionValidator<T>(validators),
	literal: <T extends string | number | boolean>(value: T) => new LiteralValidator<T>(value),
};

// ─── Utility Functions ───────────────────────────────────────────────────────

/**
 * Assert that validation passes; throw a {@link ToroidError} on failure.
 *
 * @param label - Optional label for the error message (e.g. "settings.width").
 * @returns The validated and typed value.
 * @throws ToroidError with code `"VALIDATION_ERROR"` if validation fails.
 */
export function assertValid<T>(value: unknown, validator: ValidatorFn<T>, label?: string): T {
	const result = validator(value);
	if (!result.valid || result.value === undefined) {
		const prefix = label ? `${label}: ` : "";
		const message = result.error ?? "Validation failed";
		throw new ToroidError(`${prefix}$ — ${message}`, "VALIDATION_ERROR");
	}
	return result.value;
}
