/**
 * Base class for reporter errors
 *
 * Includes the process exit code for centralized handling in the runner.
 */
export class ReporterError extends Error {
	readonly exitCode: number;

	constructor(message: string, exitCode: number = 1) {
		super(message);
		this.name = this.constructor.name;
		this.exitCode = exitCode;
	}
}
