import type { PushAttempt } from "@instance-reporter/shared";
import { ReporterError } from "./reporter-error.js";

/**
 * Thrown by the push client when every transport-level try failed
 */
export class PushTransportError extends ReporterError {
	readonly tries: number;

	constructor(tries: number, reason: string) {
		super(`Push request failed after ${tries} tries: ${reason}`);
		this.tries = tries;
	}
}

/**
 * Thrown when the push loop reaches its attempt cap without success
 */
export class RetriesExhaustedError extends ReporterError {
	readonly attempts: readonly PushAttempt[];

	constructor(attempts: readonly PushAttempt[]) {
		super(`Push loop iterations exceeded (${attempts.length} attempts)`);
		this.attempts = attempts;
	}
}
