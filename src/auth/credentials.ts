/**
 * Credentials — HTTP Basic username/password pair.
 *
 * Immutable. Parsed from URL userinfo, a netrc table or an Authorization
 * header, and attached back to outgoing requests. Renders as "[REDACTED]"
 * through toString, JSON.stringify, Node.js inspect and the logger.
 *
 * "No credentials here" is `undefined`; malformed input throws a
 * CredentialsError subclass.
 */

import { inspect } from "node:util";
import { HeaderValue } from "../lib/http/header-value.js";
import type { RequestLike } from "../lib/http/request.js";
import { percentDecode, redactUrl } from "../lib/http/url.js";
import { REDACTED, createLogger } from "../lib/logger/index.js";
import type { Logger } from "../lib/logger/index.js";
import { loadConfig } from "../shared/config.js";
import { CredentialDecodeError, HeaderEncodingError, SystemError } from "../shared/errors.js";
import type { MalformedAuthorizationError } from "../shared/errors.js";
import { map, ok, tryCatch, unwrap } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { decodeBasicToken, encodeBasicToken } from "./basic.js";
import { lookupNetrcEntry } from "./netrc.js";
import type { Netrc } from "./netrc.js";

export const AUTHORIZATION = "authorization";
export const BASIC_PREFIX = "Basic ";

// ── Private store ──────────────────────────────────────────────────

interface Secret {
	readonly username: string | undefined;
	readonly password: string | undefined;
}

// Kept off the instance so spread, Object.entries and structuredClone see nothing.
const store = new WeakMap<Credentials, Secret>();

let moduleLogger: Logger | undefined;

function log(): Logger {
	if (!moduleLogger) {
		moduleLogger = createLogger({ level: loadConfig().logLevel }).child({ module: "credentials" });
	}
	return moduleLogger;
}

export class Credentials {
	/** An empty username is stored as absent; an empty password is kept. */
	constructor(username?: string | undefined, password?: string | undefined) {
		store.set(this, { username: username === "" ? undefined : username, password });
	}

	// ── Accessors ──────────────────────────────────────────────────

	get username(): string | undefined {
		return secretOf(this).username;
	}

	get password(): string | undefined {
		return secretOf(this).password;
	}

	get isEmpty(): boolean {
		return this.username === undefined && this.password === undefined;
	}

	/** Logger marker: credentials are never serialized. */
	get __opaque(): true {
		return true;
	}

	equals(other: Credentials): boolean {
		return this.username === other.username && this.password === other.password;
	}

	// ── Sources ────────────────────────────────────────────────────

	/**
	 * Looks up the URL's host in a netrc table, falling back to the `default` entry.
	 *
	 * If `username` is given it must equal the entry's login, otherwise the
	 * result is `undefined` even when a default entry exists.
	 */
	static fromNetrc(netrc: Netrc, url: URL, username?: string | undefined): Credentials | undefined {
		const host = url.hostname;
		if (host === "") return undefined;

		const entry = lookupNetrcEntry(netrc, host);
		if (!entry) return undefined;

		if (username !== undefined && username !== entry.login) {
			log().debug({ host }, "Netrc login does not match the requested username");
			return undefined;
		}

		log().debug({ host, source: "netrc" }, "Credentials resolved");
		return new Credentials(entry.login, entry.password);
	}

	/**
	 * Reads the percent-encoded userinfo of a URL.
	 *
	 * WHATWG URLs report a missing password as "", so an empty password is
	 * treated as absent here.
	 *
	 * @throws CredentialDecodeError if a component does not decode to UTF-8
	 */
	static fromUrl(url: URL): Credentials | undefined {
		if (url.username === "" && url.password === "") return undefined;

		const credentials = new Credentials(
			url.username === "" ? undefined : decodeUserinfo(url, "username"),
			url.password === "" ? undefined : decodeUserinfo(url, "password"),
		);
		log().debug({ url: redactUrl(url), source: "url" }, "Credentials resolved");
		return credentials;
	}

	/** URL userinfo first, then the Authorization header. */
	static fromRequest(request: RequestLike): Credentials | undefined {
		const fromUrl = Credentials.fromUrl(request.url);
		if (fromUrl) return fromUrl;

		const header = request.headers.get(AUTHORIZATION);
		return header ? Credentials.fromHeaderValue(header) : undefined;
	}

	/**
	 * Parses a `Basic` Authorization header value. Other schemes yield `undefined`.
	 *
	 * An empty username or password after the `:` split is returned as absent,
	 * unlike the URL and netrc sources which keep an empty password.
	 *
	 * @throws MalformedAuthorizationError on invalid base64, invalid UTF-8 or a missing `:`
	 */
	static fromHeaderValue(header: HeaderValue | string): Credentials | undefined {
		const parsed = Credentials.parseHeaderValue(header);
		if (!parsed.ok) {
			log().warn(
				{ code: parsed.error.code, reason: parsed.error.message },
				"Malformed Basic Authorization header",
			);
		}
		return unwrap(parsed);
	}

	/** Same as fromHeaderValue, with the protocol violation returned as a value. */
	static parseHeaderValue(
		header: HeaderValue | string,
	): Result<Credentials | undefined, MalformedAuthorizationError> {
		const raw = typeof header === "string" ? header : header.value;
		if (!raw.startsWith(BASIC_PREFIX)) return ok(undefined);

		return map(
			decodeBasicToken(raw.slice(BASIC_PREFIX.length)),
			({ username, password }) => new Credentials(username, password === "" ? undefined : password),
		);
	}

	// ── Sinks ──────────────────────────────────────────────────────

	/**
	 * `Basic <base64(username:password)>`, missing fields encoded as "".
	 * The returned value is flagged sensitive.
	 *
	 * @throws HeaderEncodingError if a field is not well-formed UTF-16 (a lone surrogate)
	 */
	toHeaderValue(): HeaderValue {
		const header = tryCatch(() => {
			const token = encodeBasicToken(this.username ?? "", this.password ?? "");
			return HeaderValue.from(`${BASIC_PREFIX}${token}`, true);
		});
		if (!header.ok) {
			if (header.error instanceof HeaderEncodingError) throw header.error;
			throw new HeaderEncodingError("Basic credentials did not encode to a valid header value", {
				cause: header.error,
			});
		}
		return header.value;
	}

	/** Replaces any Authorization header on the request. Returns the same request. */
	authenticate<R extends RequestLike>(request: R): R {
		request.headers.set(AUTHORIZATION, this.toHeaderValue());
		log().debug({ url: redactUrl(request.url) }, "Basic credentials attached");
		return request;
	}

	// ── Rendering ──────────────────────────────────────────────────

	toString(): string {
		return REDACTED;
	}

	toJSON(): string {
		return REDACTED;
	}

	[inspect.custom](): string {
		return REDACTED;
	}
}

function secretOf(credentials: Credentials): Secret {
	const secret = store.get(credentials);
	if (!secret) {
		throw new SystemError("Invalid credentials object");
	}
	return secret;
}

function decodeUserinfo(url: URL, component: "username" | "password"): string {
	const decoded = percentDecode(url[component]);
	if (!decoded.ok) {
		throw new CredentialDecodeError(`URL ${component} is not valid percent-encoded UTF-8`, {
			url: redactUrl(url),
			cause: decoded.error,
		});
	}
	return decoded.value;
}
