import type { PushAttempt } from "@instance-reporter/shared";

/**
 * Runs one collect, write and push cycle.
 */
export interface Reporter {
	run(): Promise<PushAttempt[]>;
}
