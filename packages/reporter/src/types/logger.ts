/**
 * Leveled logger. Implementations prefix each line with a timestamp.
 */
export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}
