/**
 * Sleep for a specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
	return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Delay function signature, injectable where tests need to skip real waits.
 */
export type Wait = (ms: number) => Promise<void>;
