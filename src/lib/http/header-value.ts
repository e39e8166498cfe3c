/**
 * A validated HTTP header value that can be flagged sensitive.
 *
 * A sensitive value still goes out on the wire unchanged, but renders as
 * "[REDACTED]" everywhere it could end up in a log.
 */

import { inspect } from "node:util";
import { InvalidHeaderError } from "../../shared/errors.js";
import { REDACTED } from "../logger/index.js";

// Visible ASCII, space and horizontal tab (RFC 9110 field-value).
const FIELD_VALUE_RE = /^[\t\x20-\x7e]*$/;

// Raw text lives outside the instance so a spread or clone cannot carry it.
const rawValues = new WeakMap<HeaderValue, string>();

export class HeaderValue {
	readonly sensitive: boolean;

	private constructor(raw: string, sensitive: boolean) {
		rawValues.set(this, raw);
		this.sensitive = sensitive;
	}

	/**
	 * @throws InvalidHeaderError if the value contains control or non-ASCII characters
	 */
	static from(value: string, sensitive = false): HeaderValue {
		if (!FIELD_VALUE_RE.test(value)) {
			throw new InvalidHeaderError("Header value contains characters outside visible ASCII", {
				length: value.length,
			});
		}
		return new HeaderValue(value, sensitive);
	}

	/** The raw text, regardless of sensitivity. */
	get value(): string {
		return rawValues.get(this) ?? "";
	}

	/** Logger marker: sensitive values are opaque. */
	get __opaque(): boolean {
		return this.sensitive;
	}

	withSensitive(sensitive: boolean): HeaderValue {
		return sensitive === this.sensitive ? this : new HeaderValue(this.value, sensitive);
	}

	equals(other: HeaderValue | string): boolean {
		return this.value === (typeof other === "string" ? other : other.value);
	}

	toString(): string {
		return this.sensitive ? REDACTED : this.value;
	}

	toJSON(): string {
		return this.toString();
	}

	[inspect.custom](): string {
		return this.sensitive ? REDACTED : JSON.stringify(this.value);
	}
}
