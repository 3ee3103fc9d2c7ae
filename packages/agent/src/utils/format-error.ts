/**
 * Format an unknown error value into a string message.
 * Follows `cause` so wrapped errors keep their original reason.
 */
export function formatError(err: unknown): string {
	if (!(err instanceof Error)) {
		return String(err);
	}
	if (err.cause !== undefined) {
		return `${err.message} (caused by: ${formatError(err.cause)})`;
	}
	return err.message;
}

/**
 * Coerce a thrown value into an Error.
 */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
