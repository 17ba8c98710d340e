/**
 * Result Type Utilities
 *
 * Re-exports and helpers for the Result/Either pattern using neverthrow.
 * Stage functions return Results; only the CLI boundary unwraps them.
 */

import {
	Result as NeverthrowResult,
	Ok,
	Err,
	ok as neverthrowOk,
	err as neverthrowErr,
	ResultAsync,
	okAsync,
	errAsync,
} from 'neverthrow';

export type Result<T, E> = NeverthrowResult<T, E>;
export { Ok, Err, ResultAsync, okAsync, errAsync };
export const ok = neverthrowOk;
export const err = neverthrowErr;

/**
 * Unwrap a Result, throwing its error
 *
 * Used at process boundaries (CLI commands) where an error ends the run.
 */
export function unwrapOrThrow<T, E extends Error>(result: Result<T, E>): T {
	if (result.isErr()) {
		throw result.error;
	}
	return result.value;
}
