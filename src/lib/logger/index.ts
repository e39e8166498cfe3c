/**
 * Logger wrapper — structured logging backed by pino.
 *
 * Anything that marks itself opaque (`__opaque === true`: credentials,
 * sensitive header values) is replaced with "[REDACTED]" before pino sees it,
 * and configurable paths are censored on top of that.
 */

import pino from "pino";

// ── Types ───────────────────────────────────────────────────────────

/** Log severity levels from least to most severe. */
export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

/** Configuration for creating a Logger instance. */
export interface LoggerConfig {
	readonly level: LogLevel;
	readonly redactPaths?: readonly string[];
	readonly destination?: { write(msg: string): void };
}

/** Structured logger interface with auto-redaction of opaque values. */
export interface Logger {
	info(msg: string): void;
	info(obj: Record<string, unknown>, msg: string): void;
	warn(msg: string): void;
	warn(obj: Record<string, unknown>, msg: string): void;
	error(msg: string): void;
	error(obj: Record<string, unknown>, msg: string): void;
	debug(msg: string): void;
	debug(obj: Record<string, unknown>, msg: string): void;
	child(bindings: Record<string, unknown>): Logger;
}

export const REDACTED = "[REDACTED]";

// ── Opaque serializer ───────────────────────────────────────────────

/** True for values that must never be rendered, e.g. credentials. */
export function isOpaque(value: unknown): boolean {
	return (
		typeof value === "object" &&
		value !== null &&
		"__opaque" in value &&
		value.__opaque === true
	);
}

function redactOpaque(obj: object): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] = isOpaque(value) ? REDACTED : value;
	}
	return result;
}

// ── Factory ─────────────────────────────────────────────────────────

type Level = "info" | "warn" | "error" | "debug";

function emit(pinoLogger: pino.Logger, level: Level, msgOrObj: unknown, msg?: string): void {
	if (typeof msgOrObj === "string" || msgOrObj === undefined || msgOrObj === null) {
		pinoLogger[level](String(msgOrObj ?? ""));
	} else if (isOpaque(msgOrObj)) {
		pinoLogger[level]({ value: REDACTED }, msg ?? "");
	} else if (typeof msgOrObj === "object") {
		pinoLogger[level](redactOpaque(msgOrObj), msg ?? "");
	} else {
		pinoLogger[level]({ value: msgOrObj }, msg ?? "");
	}
}

function wrapPino(pinoLogger: pino.Logger): Logger {
	return {
		info(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "info", msgOrObj, msg);
		},
		warn(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "warn", msgOrObj, msg);
		},
		error(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "error", msgOrObj, msg);
		},
		debug(msgOrObj: unknown, msg?: string): void {
			emit(pinoLogger, "debug", msgOrObj, msg);
		},
		child(bindings: Record<string, unknown>): Logger {
			return wrapPino(pinoLogger.child(redactOpaque(bindings)));
		},
	};
}

/**
 * Creates a Logger backed by pino with auto-redaction and optional custom destination.
 *
 * @example
 * ```ts
 * const logger = createLogger({ level: "debug" });
 * logger.debug({ source: "netrc", host: "example.com" }, "Credentials resolved");
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
	const pinoOptions: pino.LoggerOptions = {
		level: config.level,
	};

	if (config.redactPaths && config.redactPaths.length > 0) {
		pinoOptions.redact = {
			paths: [...config.redactPaths],
			censor: REDACTED,
		};
	}

	if (config.destination) {
		const { destination } = config;
		const stream: pino.DestinationStream = {
			write(chunk: string): void {
				destination.write(chunk);
			},
		};
		return wrapPino(pino(pinoOptions, stream));
	}

	return wrapPino(pino(pinoOptions));
}
