/**
 * URL helpers: userinfo decoding and log-safe rendering.
 */

import { tryCatch } from "../../shared/result.js";
import type { Result } from "../../shared/result.js";

/** The URL as a string with username and password stripped. */
export function redactUrl(url: URL | string): string {
	const copy = new URL(url);
	copy.username = "";
	copy.password = "";
	return copy.toString();
}

/** True when the URL carries a username or password in its authority. */
export function hasUserinfo(url: URL): boolean {
	return url.username !== "" || url.password !== "";
}

const PERCENT_SEGMENT_RE = /%[0-9A-Fa-f]{2}|[^%]+|%/g;
const utf8 = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true });

/**
 * Percent-decodes a URL component. Escapes that are not `%` followed by two
 * hex digits are kept literally; the decoded bytes must be valid UTF-8.
 */
export function percentDecode(input: string): Result<string, Error> {
	const chunks: Buffer[] = [];
	for (const match of input.matchAll(PERCENT_SEGMENT_RE)) {
		const segment = match[0] ?? "";
		if (segment.length === 3 && segment.startsWith("%")) {
			chunks.push(Buffer.from([Number.parseInt(segment.slice(1), 16)]));
		} else {
			chunks.push(Buffer.from(segment, "utf8"));
		}
	}
	return tryCatch(() => utf8.decode(Buffer.concat(chunks)));
}
