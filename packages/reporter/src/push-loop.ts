import type { PushAttempt, PushResponse } from "@instance-reporter/shared";
import type { Logger, PushClient, PushLoop } from "./types";
import { PushTransportError, RetriesExhaustedError } from "./errors";
import { LoggerImpl } from "./logger";
import { isKnownTransientAuthFailure } from "./transient-failure";
import { type Wait, sleep } from "./utils";

export interface PushLoopOptions {
	maxAttempts: number;
	/** Fixed delay before every attempt, including the first */
	retryDelayMs: number;
}

/**
 * Push loop implementation.
 * Waits a fixed delay before each attempt and stops at the first response
 * that is not the known transient failure.
 */
export class PushLoopImpl implements PushLoop {
	private readonly logger: Logger;

	constructor(
		private readonly client: PushClient,
		private readonly options: PushLoopOptions,
		logger?: Logger,
		private readonly wait: Wait = sleep,
	) {
		this.logger = logger ?? new LoggerImpl("push");
	}

	async run(body: Uint8Array): Promise<PushAttempt[]> {
		const { maxAttempts, retryDelayMs } = this.options;
		const attempts: PushAttempt[] = [];

		while (attempts.length < maxAttempts) {
			await this.wait(retryDelayMs);

			const attempt = await this.attempt(attempts.length + 1, body);
			attempts.push(attempt);
			if (attempt.success) {
				return attempts;
			}
		}

		this.logger.error("Push loop iterations exceeded");
		throw new RetriesExhaustedError(attempts);
	}

	private async attempt(attempt: number, body: Uint8Array): Promise<PushAttempt> {
		this.logger.info(`Pushing metrics (attempt ${attempt}/${this.options.maxAttempts})`);

		let response: PushResponse;
		try {
			response = await this.client.push(body);
		} catch (err) {
			if (!(err instanceof PushTransportError)) {
				throw err;
			}
			// No response body: not the transient failure, so the push is done
			this.logger.error(err.message);
			this.logger.info("Checking result: ");
			return { attempt, status: null, body: "", success: true };
		}

		const { status, body: responseBody } = response;
		this.logger.info(`Checking result: ${responseBody}`);

		if (isKnownTransientAuthFailure(responseBody)) {
			this.logger.warn("Retrying due to temporary password failure");
			return { attempt, status, body: responseBody, success: false };
		}

		if (status < 200 || status >= 300) {
			this.logger.warn(`Push endpoint answered status ${status}; response accepted as delivered`);
		}
		return { attempt, status, body: responseBody, success: true };
	}
}
