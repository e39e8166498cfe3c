/**
 * Case-insensitive, multi-valued header collection.
 *
 * Values stored under a sensitive name (Authorization, Cookie, ...) are
 * flagged sensitive on the way in, whatever the caller passed.
 */

import { loadConfig } from "../../shared/config.js";
import { InvalidHeaderError } from "../../shared/errors.js";
import { HeaderValue } from "./header-value.js";

// RFC 9110 token.
const FIELD_NAME_RE = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

export type HeaderInit =
	| HeaderMap
	| Iterable<readonly [string, HeaderValue | string]>
	| Record<string, HeaderValue | string>;

export interface HeaderMapOptions {
	/** Lower-cased names whose values are always sensitive. Defaults to the resolved config. */
	readonly sensitiveHeaders?: readonly string[];
}

export class HeaderMap {
	private readonly values = new Map<string, HeaderValue[]>();
	private readonly sensitiveNames: ReadonlySet<string>;

	constructor(init?: HeaderInit, options: HeaderMapOptions = {}) {
		this.sensitiveNames = new Set(options.sensitiveHeaders ?? loadConfig().sensitiveHeaders);
		if (init === undefined) return;
		if (init instanceof HeaderMap) {
			for (const [name, value] of init.entries()) this.append(name, value);
		} else if (isIterable(init)) {
			for (const [name, value] of init) this.append(name, value);
		} else {
			for (const [name, value] of Object.entries(init)) this.append(name, value);
		}
	}

	get size(): number {
		return this.values.size;
	}

	has(name: string): boolean {
		return this.values.has(normalizeName(name));
	}

	/** First value stored under `name`. */
	get(name: string): HeaderValue | undefined {
		return this.values.get(normalizeName(name))?.[0];
	}

	getAll(name: string): readonly HeaderValue[] {
		return this.values.get(normalizeName(name)) ?? [];
	}

	/** Replaces every value stored under `name`. */
	set(name: string, value: HeaderValue | string): this {
		const key = normalizeName(name);
		this.values.set(key, [this.coerce(key, value)]);
		return this;
	}

	append(name: string, value: HeaderValue | string): this {
		const key = normalizeName(name);
		const existing = this.values.get(key);
		const coerced = this.coerce(key, value);
		if (existing) {
			existing.push(coerced);
		} else {
			this.values.set(key, [coerced]);
		}
		return this;
	}

	delete(name: string): boolean {
		return this.values.delete(normalizeName(name));
	}

	*entries(): IterableIterator<[string, HeaderValue]> {
		for (const [name, list] of this.values) {
			for (const value of list) yield [name, value];
		}
	}

	[Symbol.iterator](): IterableIterator<[string, HeaderValue]> {
		return this.entries();
	}

	/** WHATWG Headers for handing the request to fetch. Carries raw values. */
	toFetchHeaders(): Headers {
		const headers = new Headers();
		for (const [name, value] of this.entries()) {
			headers.append(name, value.value);
		}
		return headers;
	}

	/** Log-safe rendering: sensitive values come out redacted. */
	toJSON(): Record<string, string | string[]> {
		const out: Record<string, string | string[]> = {};
		for (const [name, list] of this.values) {
			const rendered = list.map((v) => v.toString());
			out[name] = rendered.length === 1 ? (rendered[0] ?? "") : rendered;
		}
		return out;
	}

	private coerce(name: string, value: HeaderValue | string): HeaderValue {
		const header = typeof value === "string" ? HeaderValue.from(value) : value;
		return this.sensitiveNames.has(name) ? header.withSensitive(true) : header;
	}
}

function normalizeName(name: string): string {
	if (!FIELD_NAME_RE.test(name)) {
		throw new InvalidHeaderError(`Invalid header name: "${name}"`);
	}
	return name.toLowerCase();
}

function isIterable(
	init: Iterable<readonly [string, HeaderValue | string]> | Record<string, HeaderValue | string>,
): init is Iterable<readonly [string, HeaderValue | string]> {
	return Symbol.iterator in init;
}
