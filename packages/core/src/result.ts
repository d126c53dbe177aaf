// =============================================================================
// RESULT — explicit success/failure values for fallible operations
// =============================================================================

export type Result<T, E = Error> = { success: true; data: T } | { success: false; error: E };

export function Ok<T>(data: T): Result<T, never> {
	return { success: true, data };
}

export function Err<E>(error: E): Result<never, E> {
	return { success: false, error };
}

/** Return the data of a successful result, or throw its error. */
export function unwrap<T, E>(result: Result<T, E>): T {
	if (result.success) return result.data;
	throw result.error;
}
