import { ReporterError } from "./reporter-error.js";

/**
 * Thrown when the log file cannot be opened for appending
 */
export class LogFileError extends ReporterError {
	constructor(logFile: string, reason: string) {
		super(`Could not start logging to ${logFile}: ${reason}`);
	}
}
