/**
 * Result<T, E> — errors as values for parsers that must tell
 * "malformed" apart from "absent".
 *
 * Use ok()/err() to build them, map() and unwrap() to consume them.
 */

/** Discriminated union for fallible operations -- `ok: true` carries a value, `ok: false` carries an error. */
export type Result<T, E = Error> =
	| { readonly ok: true; readonly value: T }
	| { readonly ok: false; readonly error: E };

// ── Factories ────────────────────────────────────────────────────────

/** Create a successful Result wrapping the given value. */
export function ok<T>(value: T): Result<T, never> {
	return { ok: true, value };
}

/** Create a failed Result wrapping the given error. */
export function err<E>(error: E): Result<never, E> {
	return { ok: false, error };
}

// ── Combinators ──────────────────────────────────────────────────────

/** Transform the success value of a Result, leaving errors untouched. */
export function map<T, U, E>(result: Result<T, E>, fn: (value: T) => U): Result<U, E> {
	return result.ok ? ok(fn(result.value)) : result;
}

/** Extract the success value or throw the error. Use at API boundaries only. */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.ok) return result.value;
	throw result.error instanceof Error ? result.error : new Error(String(result.error));
}

/** Wrap a synchronous function call in a Result, catching any thrown errors. */
export function tryCatch<T>(fn: () => T): Result<T, Error> {
	try {
		return ok(fn());
	} catch (e) {
		return err(e instanceof Error ? e : new Error(String(e)));
	}
}
