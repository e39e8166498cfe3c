/**
 * CredentialsError hierarchy — structured error classification.
 *
 * "No credentials" is never an error: parsers return `undefined` for it.
 * Everything here signals malformed input or a broken invariant, and the
 * category tells callers whether the condition is worth surfacing or fatal.
 */

/** Error severity categories. */
export const ErrorCategory = {
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Options for constructing CredentialsError subclasses with optional cause chain. */
interface CredentialsErrorOptions {
	readonly cause?: unknown;
}

/** Base error class for credential parsing and encoding. Context must not carry secrets. */
export class CredentialsError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;
	readonly hint: string | undefined;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: Record<string, unknown> = {},
		hint?: string,
	) {
		super(message);
		this.name = "CredentialsError";
		this.category = category;
		this.code = code;
		this.context = context;
		this.hint = hint;
	}

	get isFatal(): boolean {
		return this.category === ErrorCategory.Fatal;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			...(this.hint !== undefined && { hint: this.hint }),
			fatal: this.isFatal,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** A `Basic` Authorization header whose payload is not base64 of `user:password`. */
export class MalformedAuthorizationError extends CredentialsError {
	constructor(message: string, context: Record<string, unknown> & CredentialsErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(
			message,
			"MALFORMED_AUTHORIZATION",
			ErrorCategory.Fatal,
			rest,
			"The peer sent a Basic Authorization header that violates RFC 7617",
		);
		this.name = "MalformedAuthorizationError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** URL userinfo that does not percent-decode to valid UTF-8. */
export class CredentialDecodeError extends CredentialsError {
	constructor(message: string, context: Record<string, unknown> & CredentialsErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CREDENTIAL_DECODE", ErrorCategory.Fatal, rest);
		this.name = "CredentialDecodeError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Building an Authorization header value failed. */
export class HeaderEncodingError extends CredentialsError {
	constructor(message: string, context: Record<string, unknown> & CredentialsErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "HEADER_ENCODING", ErrorCategory.Fatal, rest);
		this.name = "HeaderEncodingError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** A header name or value containing characters HTTP does not allow. */
export class InvalidHeaderError extends CredentialsError {
	constructor(message: string, context: Record<string, unknown> & CredentialsErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "INVALID_HEADER", ErrorCategory.NonRetryable, rest);
		this.name = "InvalidHeaderError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for invalid configuration. */
export class ConfigError extends CredentialsError {
	constructor(message: string, context: Record<string, unknown> & CredentialsErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, rest);
		this.name = "ConfigError";
		if (cause !== undefined) this.cause = cause;
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends CredentialsError {
	constructor(message: string, context: Record<string, unknown> & CredentialsErrorOptions = {}) {
		const { cause, ...rest } = context;
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, rest);
		this.name = "SystemError";
		if (cause !== undefined) this.cause = cause;
	}
}

// ── Classifier ───────────────────────────────────────────────────────

/**
 * Normalizes anything thrown into a CredentialsError.
 * Known errors pass through unchanged; everything else becomes a SystemError.
 */
export function classifyError(error: unknown): CredentialsError {
	if (error instanceof CredentialsError) return error;
	if (error instanceof Error) {
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for MalformedAuthorizationError. */
export function isMalformedAuthorization(e: unknown): e is MalformedAuthorizationError {
	return e instanceof MalformedAuthorizationError;
}

/** Type guard for CredentialDecodeError. */
export function isCredentialDecodeError(e: unknown): e is CredentialDecodeError {
	return e instanceof CredentialDecodeError;
}

/** Type guard for HeaderEncodingError. */
export function isHeaderEncodingError(e: unknown): e is HeaderEncodingError {
	return e instanceof HeaderEncodingError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
