/**
 * Package configuration, overridable through the environment.
 */

import { createLogger } from "../lib/logger/index.js";
import type { LogLevel } from "../lib/logger/index.js";
import { validate, z } from "../lib/validation/index.js";
import { ConfigError } from "./errors.js";
import { tryCatch } from "./result.js";

export interface CredentialsConfig {
	/** Level for the package's internal logger */
	readonly logLevel: LogLevel;
	/** Lower-cased header names whose values are always marked sensitive */
	readonly sensitiveHeaders: readonly string[];
}

export const DEFAULT_SENSITIVE_HEADERS: readonly string[] = [
	"authorization",
	"proxy-authorization",
	"cookie",
	"set-cookie",
];

export const DEFAULT_CREDENTIALS_CONFIG: CredentialsConfig = {
	logLevel: "warn",
	sensitiveHeaders: DEFAULT_SENSITIVE_HEADERS,
};

const logLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "fatal"]);

const HEADER_NAME_RE = /^[!#$%&'*+\-.^_`|~0-9a-z]+$/;

/** Mutable builder shape for constructing Partial<CredentialsConfig>. */
interface MutableCredentialsConfig {
	logLevel?: LogLevel;
	sensitiveHeaders?: string[];
}

/**
 * Reads config values from environment variables.
 * Supported: BASIC_AUTH_LOG_LEVEL, BASIC_AUTH_SENSITIVE_HEADERS (comma-separated,
 * added to the defaults).
 * @throws ConfigError if a variable holds an invalid value
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Partial<CredentialsConfig> {
	const result: MutableCredentialsConfig = {};

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const rawLevel = env["BASIC_AUTH_LOG_LEVEL"];
	if (rawLevel) {
		const level = validate(logLevelSchema, rawLevel.trim().toLowerCase());
		if (!level.ok) {
			throw new ConfigError(
				`Invalid BASIC_AUTH_LOG_LEVEL: "${rawLevel}" must be one of ${logLevelSchema.options.join(", ")}`,
				{ cause: level.error },
			);
		}
		result.logLevel = level.value;
	}

	// biome-ignore lint/complexity/useLiteralKeys: TS4111 requires bracket access on index signatures
	const rawHeaders = env["BASIC_AUTH_SENSITIVE_HEADERS"];
	if (rawHeaders) {
		result.sensitiveHeaders = mergeHeaderNames(DEFAULT_SENSITIVE_HEADERS, parseHeaderList(rawHeaders));
	}

	return result;
}

/** Defaults overlaid with whatever the environment sets. */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): CredentialsConfig {
	return { ...DEFAULT_CREDENTIALS_CONFIG, ...configFromEnv(env) };
}

let loaded: CredentialsConfig | undefined;

/**
 * resolveConfig() against process.env, once per process.
 *
 * Called lazily by the package itself, so a bad environment never makes an
 * import throw: the defaults apply and a warning names the offending value.
 */
export function loadConfig(): CredentialsConfig {
	if (loaded) return loaded;

	const resolved = tryCatch(() => resolveConfig());
	if (resolved.ok) {
		loaded = resolved.value;
	} else {
		createLogger({ level: DEFAULT_CREDENTIALS_CONFIG.logLevel }).warn(
			{ reason: resolved.error.message },
			"Invalid environment configuration, using defaults",
		);
		loaded = DEFAULT_CREDENTIALS_CONFIG;
	}
	return loaded;
}

function parseHeaderList(raw: string): string[] {
	const names = raw
		.split(",")
		.map((name) => name.trim().toLowerCase())
		.filter((name) => name.length > 0);
	for (const name of names) {
		if (!HEADER_NAME_RE.test(name)) {
			throw new ConfigError(`Invalid BASIC_AUTH_SENSITIVE_HEADERS: "${name}" is not a header name`);
		}
	}
	return names;
}

function mergeHeaderNames(base: readonly string[], extra: readonly string[]): string[] {
	return [...new Set([...base, ...extra])];
}
