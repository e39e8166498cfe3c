import { describe, expect, it } from "vitest";
import { z } from "zod";
import { CredentialsError } from "../../shared/errors.js";
import { ValidationError, validate } from "./index.js";

describe("validation wrapper", () => {
	describe("validate()", () => {
		it("returns ok(data) for valid input", () => {
			const result = validate(z.string(), "hello");

			expect(result.ok).toBe(true);
			if (result.ok) {
				expect(result.value).toBe("hello");
			}
		});

		it("returns err(ValidationError) for invalid input", () => {
			const result = validate(z.number(), "not a number");

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error).toBeInstanceOf(ValidationError);
			}
		});

		it("includes issue paths for nested objects", () => {
			const schema = z.object({
				entry: z.object({
					login: z.string(),
					password: z.string(),
				}),
			});
			const result = validate(schema, { entry: { login: 42, password: "pw" } });

			expect(result.ok).toBe(false);
			if (!result.ok) {
				expect(result.error.issues).toHaveLength(1);
				expect(result.error.issues[0]?.path).toEqual(["entry", "login"]);
				expect(result.error.issues[0]?.message.length).toBeGreaterThan(0);
				expect(result.error.context).toEqual({ paths: ["entry.login"] });
			}
		});
	});

	describe("ValidationError", () => {
		it("extends CredentialsError with correct code and category", () => {
			const issues = [{ path: ["field"] as readonly (string | number)[], message: "bad" }];
			const error = new ValidationError("Validation failed", issues);

			expect(error).toBeInstanceOf(CredentialsError);
			expect(error).toBeInstanceOf(Error);
			expect(error.code).toBe("VALIDATION_FAILED");
			expect(error.category).toBe("non_retryable");
			expect(error.isFatal).toBe(false);
			expect(error.issues).toBe(issues);
		});
	});
});
