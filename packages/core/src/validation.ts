/**
 * Niyama — runtime validation for caller-supplied options.
 * Sanskrit: Niyama (नियम) = rule, observance.
 *
 * Small fluent validators for checking option objects that arrive from
 * untyped callers (plain JavaScript, parsed JSON, environment variables).
 */

import { ConfigurationError } from "./errors.js";

// ─── Types ───────────────────────────────────────────────────────────────────

export type ValidatorFn<T = unknown> = (value: unknown) => { valid: boolean; error?: string; value?: T };

export interface ValidationError {
	path: string;
	message: string;
	received: unknown;
}

export interface ValidationResult<T = unknown> {
	valid: boolean;
	errors: ValidationError[];
	value?: T;
}

// ─── Validator Classes ───────────────────────────────────────────────────────

class StringValidator {
	private minLen?: number;
	private patternRe?: RegExp;

	min(n: number): this {
		this.minLen = n;
		return this;
	}

	pattern(re: RegExp): this {
		this.patternRe = re;
		return this;
	}

	validate: ValidatorFn<string> = (value: unknown) => {
		if (typeof value !== "string") {
			return { valid: false, error: `Expected string, received ${typeof value}` };
		}
		if (this.minLen !== undefined && value.length < this.minLen) {
			return { valid: false, error: `String length ${value.length} is below minimum ${this.minLen}` };
		}
		if (this.patternRe && !this.patternRe.test(value)) {
			return { valid: false, error: `String ${JSON.stringify(value)} does not match pattern ${this.patternRe}` };
		}
		return { valid: true, value };
	};
}

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

class ArrayValidator<T> {
	constructor(private itemValidator: ValidatorFn<T>) {}

	validate: ValidatorFn<T[]> = (value: unknown) => {
		if (!Array.isArray(value)) {
			return { valid: false, error: `Expected array, received ${typeof value}` };
		}
		const validated: T[] = [];
		for (let i = 0; i < value.length; i++) {
			const result = this.itemValidator(value[i]);
			if (!result.valid || result.value === undefined) {
				return { valid: false, error: `[${i}]: ${result.error ?? "missing value"}` };
			}
			validated.push(result.value);
		}
		return { valid: true, value: validated };
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
		const result: Record<string, unknown> = {};
		const errors: string[] = [];

		for (const [key, validator] of Object.entries(this.schema)) {
			const fieldResult = validator(Reflect.get(value, key));
			if (!fieldResult.valid) {
				errors.push(`${key}: ${fieldResult.error}`);
			} else if (fieldResult.value !== undefined) {
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
		if (value === undefined) {
			return { valid: true, value: undefined };
		}
		return this.inner(value);
	};
}

// ─── Fluent Builder ──────────────────────────────────────────────────────────

/**
 * Fluent validator builders.
 *
 * ```ts
 * const optionsV = v.object({
 *   origin: v.optional(v.string().validate).validate,
 *   handshakeTimeoutMs: v.optional(v.number().integer().min(0).validate).validate,
 * }).validate;
 * ```
 */
export const v = {
	string: () => new StringValidator(),
	number: () => new NumberValidator(),
	array: <T>(itemValidator: ValidatorFn<T>) => new ArrayValidator<T>(itemValidator),
	object: <T extends Record<string, ValidatorFn>>(schema: T) => new ObjectValidator<T>(schema),
	optional: <T>(validator: ValidatorFn<T>) => new OptionalValidator<T>(validator),
};

// ─── Utility Functions ───────────────────────────────────────────────────────

/**
 * Validate a value and collect the failure into a {@link ValidationResult}
 * instead of throwing.
 */
export function validate<T>(value: unknown, validator: ValidatorFn<T>): ValidationResult<T> {
	const result = validator(value);
	if (result.valid) {
		return { valid: true, errors: [], value: result.value };
	}
	return {
		valid: false,
		errors: [{
			path: "$",
			message: result.error ?? "Validation failed",
			received: value,
		}],
	};
}

/**
 * Assert that validation passes and return the validated value.
 *
 * @param label - Prefix for the error message (e.g. "connect options").
 * @throws ConfigurationError if validation fails.
 */
export function assertValid<T>(value: unknown, validator: ValidatorFn<T>, label?: string): T {
	const result = validate(value, validator);
	if (!result.valid || result.value === undefined) {
		const prefix = label ? `${label}: ` : "";
		const messages = result.errors.map((e) => e.message).join("; ");
		throw new ConfigurationError(`${prefix}${messages || "missing value"}`);
	}
	return result.value;
}
