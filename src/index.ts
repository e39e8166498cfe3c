// ── Shared Kernel ────────────────────────────────────────────────────
export {
	type Result,
	ok,
	err,
	map,
	unwrap,
	tryCatch,
	type CredentialsConfig,
	DEFAULT_CREDENTIALS_CONFIG,
	DEFAULT_SENSITIVE_HEADERS,
	configFromEnv,
	loadConfig,
	resolveConfig,
	CredentialsError,
	ErrorCategory,
	MalformedAuthorizationError,
	CredentialDecodeError,
	HeaderEncodingError,
	InvalidHeaderError,
	ConfigError,
	SystemError,
	classifyError,
	isMalformedAuthorization,
	isCredentialDecodeError,
	isHeaderEncodingError,
	isConfigError,
} from "./shared/index.js";

// ── Auth ────────────────────────────────────────────────────────────
export {
	AUTHORIZATION,
	BASIC_PREFIX,
	Credentials,
	DEFAULT_NETRC_HOST,
	createNetrc,
	decodeBasicToken,
	encodeBasicToken,
	lookupNetrcEntry,
	netrcFromRecord,
} from "./auth/index.js";
export type { BasicPair, Netrc, NetrcEntry } from "./auth/index.js";

// ── Lib: HTTP ───────────────────────────────────────────────────────
export {
	HeaderMap,
	HeaderValue,
	HttpRequest,
	hasUserinfo,
	percentDecode,
	redactUrl,
} from "./lib/http/index.js";
export type { HeaderInit, HeaderMapOptions, HttpRequestInit, RequestLike } from "./lib/http/index.js";

// ── Lib: Logger ─────────────────────────────────────────────────────
export { REDACTED, createLogger, isOpaque } from "./lib/logger/index.js";
export type { Logger, LoggerConfig, LogLevel } from "./lib/logger/index.js";

// ── Lib: Validation ─────────────────────────────────────────────────
export { validate, ValidationError, z } from "./lib/validation/index.js";
export type { ValidationIssue } from "./lib/validation/index.js";
