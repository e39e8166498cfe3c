export {
	type Result,
	ok,
	err,
	map,
	unwrap,
	tryCatch,
} from "./result.js";

export {
	ErrorCategory,
	CredentialsError,
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
} from "./errors.js";

export {
	type CredentialsConfig,
	DEFAULT_CREDENTIALS_CONFIG,
	DEFAULT_SENSITIVE_HEADERS,
	configFromEnv,
	loadConfig,
	resolveConfig,
} from "./config.js";
