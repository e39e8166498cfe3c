/**
 * An outgoing request description that credentials attach to.
 *
 * Executing the request is left to the caller; `toFetchInit()` hands the
 * headers to `fetch` with their raw values.
 */

import { inspect } from "node:util";
import { HeaderMap } from "./headers.js";
import type { HeaderInit, HeaderMapOptions } from "./headers.js";
import { redactUrl } from "./url.js";

/** The parts of a request that credential extraction reads and writes. */
export interface RequestLike {
	readonly url: URL;
	readonly headers: HeaderMap;
}

export interface HttpRequestInit extends HeaderMapOptions {
	readonly method?: string;
	readonly headers?: HeaderInit;
}

export class HttpRequest implements RequestLike {
	readonly method: string;
	readonly url: URL;
	readonly headers: HeaderMap;

	constructor(url: URL | string, init: HttpRequestInit = {}) {
		this.method = (init.method ?? "GET").toUpperCase();
		this.url = new URL(url);
		this.headers = new HeaderMap(init.headers, init);
	}

	/** URL and method for `fetch(request.url, request.toFetchInit())`. */
	toFetchInit(): { method: string; headers: Headers } {
		return { method: this.method, headers: this.headers.toFetchHeaders() };
	}

	/** Log-safe rendering: no userinfo, sensitive headers redacted. */
	toJSON(): Record<string, unknown> {
		return {
			method: this.method,
			url: redactUrl(this.url),
			headers: this.headers.toJSON(),
		};
	}

	[inspect.custom](): string {
		return `HttpRequest ${JSON.stringify(this.toJSON())}`;
	}
}
