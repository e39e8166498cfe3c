/**
 * HTTP Basic token codec (RFC 7617): `base64("<username>:<password>")`.
 */

import { HeaderEncodingError, MalformedAuthorizationError } from "../shared/errors.js";
import { err, ok, tryCatch } from "../shared/result.js";
import type { Result } from "../shared/result.js";

export interface BasicPair {
	readonly username: string;
	readonly password: string;
}

const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

// Buffer would encode a lone surrogate as U+FFFD, i.e. a different user.
const LONE_SURROGATE_RE = /\p{Cs}/u;

/**
 * Standard alphabet, with padding.
 *
 * @throws HeaderEncodingError if either field contains a lone surrogate
 */
export function encodeBasicToken(username: string, password: string): string {
	const payload = `${username}:${password}`;
	if (LONE_SURROGATE_RE.test(payload)) {
		throw new HeaderEncodingError("Basic credentials are not well-formed UTF-16", {
			field: LONE_SURROGATE_RE.test(username) ? "username" : "password",
		});
	}
	return Buffer.from(payload, "utf8").toString("base64");
}

/**
 * Decodes a Basic token and splits it on the first `:`.
 *
 * Only canonical standard base64 with padding is accepted, and the payload
 * must be UTF-8. Empty halves are returned as empty strings.
 */
export function decodeBasicToken(token: string): Result<BasicPair, MalformedAuthorizationError> {
	const bytes = Buffer.from(token, "base64");
	// Buffer skips invalid characters and missing padding; re-encoding exposes both.
	if (bytes.toString("base64") !== token) {
		return err(
			new MalformedAuthorizationError("Basic credentials are not valid base64", {
				tokenLength: token.length,
			}),
		);
	}

	const text = tryCatch(() => utf8.decode(bytes));
	if (!text.ok) {
		return err(
			new MalformedAuthorizationError("Basic credentials are not valid UTF-8", {
				cause: text.error,
			}),
		);
	}

	const separator = text.value.indexOf(":");
	if (separator === -1) {
		return err(new MalformedAuthorizationError("Basic credentials are missing the `:` separator"));
	}

	return ok({
		username: text.value.slice(0, separator),
		password: text.value.slice(separator + 1),
	});
}
