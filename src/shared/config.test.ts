import { afterEach, describe, expect, it, vi } from "vitest";
import {
	DEFAULT_CREDENTIALS_CONFIG,
	DEFAULT_SENSITIVE_HEADERS,
	configFromEnv,
	resolveConfig,
} from "./config.js";
import { ConfigError } from "./errors.js";

describe("CredentialsConfig", () => {
	describe("DEFAULT_CREDENTIALS_CONFIG", () => {
		it("logs warnings and above by default", () => {
			expect(DEFAULT_CREDENTIALS_CONFIG.logLevel).toBe("warn");
		});

		it("treats authorization and cookie headers as sensitive", () => {
			expect(DEFAULT_CREDENTIALS_CONFIG.sensitiveHeaders).toEqual([
				"authorization",
				"proxy-authorization",
				"cookie",
				"set-cookie",
			]);
		});
	});

	describe("configFromEnv", () => {
		it("returns an empty object when nothing is set", () => {
			expect(configFromEnv({})).toEqual({});
		});

		it("reads BASIC_AUTH_LOG_LEVEL case-insensitively", () => {
			expect(configFromEnv({ BASIC_AUTH_LOG_LEVEL: " Debug " })).toEqual({ logLevel: "debug" });
		});

		it("throws ConfigError for an unknown level", () => {
			expect(() => configFromEnv({ BASIC_AUTH_LOG_LEVEL: "verbose" })).toThrow(ConfigError);
		});

		it("adds BASIC_AUTH_SENSITIVE_HEADERS to the defaults", () => {
			const result = configFromEnv({ BASIC_AUTH_SENSITIVE_HEADERS: "X-Api-Key, cookie,," });
			expect(result.sensitiveHeaders).toEqual([...DEFAULT_SENSITIVE_HEADERS, "x-api-key"]);
		});

		it("throws ConfigError for an invalid header name", () => {
			expect(() => configFromEnv({ BASIC_AUTH_SENSITIVE_HEADERS: "x api key" })).toThrow(
				ConfigError,
			);
		});
	});

	describe("resolveConfig", () => {
		it("overlays the environment on the defaults", () => {
			expect(resolveConfig({ BASIC_AUTH_LOG_LEVEL: "error" })).toEqual({
				logLevel: "error",
				sensitiveHeaders: DEFAULT_SENSITIVE_HEADERS,
			});
		});

		it("reads process.env when no environment is passed", () => {
			process.env["BASIC_AUTH_LOG_LEVEL"] = "info";
			try {
				expect(resolveConfig().logLevel).toBe("info");
			} finally {
				Reflect.deleteProperty(process.env, "BASIC_AUTH_LOG_LEVEL");
			}
		});
	});

	describe("loadConfig", () => {
		afterEach(() => {
			vi.unstubAllEnvs();
			vi.resetModules();
		});

		it("falls back to the defaults on an invalid environment", async () => {
			vi.stubEnv("BASIC_AUTH_LOG_LEVEL", "verbose");
			vi.resetModules();
			const { loadConfig, DEFAULT_CREDENTIALS_CONFIG: defaults } = await import("./config.js");

			expect(loadConfig()).toBe(defaults);
		});

		it("resolves the environment once", async () => {
			vi.stubEnv("BASIC_AUTH_LOG_LEVEL", "error");
			vi.resetModules();
			const { loadConfig } = await import("./config.js");

			const first = loadConfig();
			vi.stubEnv("BASIC_AUTH_LOG_LEVEL", "debug");
			expect(first.logLevel).toBe("error");
			expect(loadConfig()).toBe(first);
		});

		it("a bad environment does not break importing or using the package", async () => {
			vi.stubEnv("BASIC_AUTH_LOG_LEVEL", "verbose");
			vi.stubEnv("BASIC_AUTH_SENSITIVE_HEADERS", "not a header");
			vi.resetModules();
			const { Credentials, HttpRequest } = await import("../index.js");

			const request = new Credentials("user", "password").authenticate(
				new HttpRequest("https://example.com/"),
			);
			expect(request.headers.get("authorization")?.sensitive).toBe(true);
			expect(Credentials.fromRequest(request)?.username).toBe("user");
		});
	});
});
