/**
 * Format an unknown error value into a string message.
 * Includes the cause for fetch failures, whose message alone is just "fetch failed".
 */
export function formatError(err: unknown): string {
	if (!(err instanceof Error)) {
		return String(err);
	}
	if (err.cause instanceof Error) {
		return `${err.message} (${err.cause.message})`;
	}
	return err.message;
}
