import type { PushAttempt } from "@instance-reporter/shared";

/**
 * Delivers a payload, retrying known transient failures up to a fixed cap.
 */
export interface PushLoop {
	/**
	 * @returns every attempt made, the last one successful.
	 * @throws RetriesExhaustedError when the cap is reached without success.
	 */
	run(body: Uint8Array): Promise<PushAttempt[]>;
}
