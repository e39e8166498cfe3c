/**
 * Parsed netrc tables. Reading and tokenizing the file belongs to the loader;
 * this module only types, validates and queries the result.
 */

import { validate, z } from "../lib/validation/index.js";
import type { ValidationError } from "../lib/validation/index.js";
import { map } from "../shared/result.js";
import type { Result } from "../shared/result.js";

/** Host name used by the `default` stanza of a netrc file. */
export const DEFAULT_NETRC_HOST = "default";

export interface NetrcEntry {
	readonly login: string;
	readonly password: string;
	readonly account?: string | undefined;
}

export interface Netrc {
	readonly hosts: ReadonlyMap<string, NetrcEntry>;
}

const netrcEntrySchema = z.object({
	login: z.string(),
	password: z.string(),
	account: z.string().optional(),
});

const netrcTableSchema = z.record(z.string(), netrcEntrySchema);

/** Builds a table from `[host, entry]` pairs or a host-keyed object. */
export function createNetrc(
	hosts: Iterable<readonly [string, NetrcEntry]> | Readonly<Record<string, NetrcEntry>>,
): Netrc {
	if (isEntryIterable(hosts)) {
		return { hosts: new Map(hosts) };
	}
	return { hosts: new Map(Object.entries(hosts)) };
}

/**
 * Validates untyped loader output shaped `{ [host]: { login, password, account? } }`.
 */
export function netrcFromRecord(data: unknown): Result<Netrc, ValidationError> {
	return map(validate(netrcTableSchema, data), (table) => createNetrc(table));
}

/** Exact host first, then the `default` entry. */
export function lookupNetrcEntry(netrc: Netrc, host: string): NetrcEntry | undefined {
	return netrc.hosts.get(host) ?? netrc.hosts.get(DEFAULT_NETRC_HOST);
}

function isEntryIterable(
	hosts: Iterable<readonly [string, NetrcEntry]> | Readonly<Record<string, NetrcEntry>>,
): hosts is Iterable<readonly [string, NetrcEntry]> {
	return Symbol.iterator in hosts;
}
