import type { PushResponse } from "@instance-reporter/shared";
import type { Logger, PushClient, ReporterConfig } from "./types";
import { PushTransportError } from "./errors";
import { LoggerImpl } from "./logger";
import { type Wait, formatError, sleep } from "./utils";

/**
 * Build the data push URL for a customer instance.
 */
export function buildPushUrl(config: Pick<ReporterConfig, "metricsHost" | "metricsCustomer" | "metricsInstance">): string {
	const customer = encodeURIComponent(config.metricsCustomer);
	const instance = encodeURIComponent(config.metricsInstance);
	return `${config.metricsHost}/data/?customer=${customer}&instance=${instance}`;
}

/**
 * Push client implementation for the data push gateway.
 * Sends the payload with basic auth; connection-level failures are retried
 * `transportRetries` times before the call gives up.
 */
export class PushClientImpl implements PushClient {
	private readonly url: string;
	private readonly authorization: string;
	private readonly transportRetries: number;
	private readonly transportRetryDelayMs: number;
	private readonly requestTimeoutMs: number;
	private readonly logger: Logger;

	constructor(
		config: ReporterConfig,
		logger?: Logger,
		private readonly wait: Wait = sleep,
	) {
		this.url = buildPushUrl(config);
		this.authorization = `Basic ${Buffer.from(`${config.metricsUser}:${config.metricsPassword}`).toString("base64")}`;
		this.transportRetries = config.transportRetries;
		this.transportRetryDelayMs = config.transportRetryDelayMs;
		this.requestTimeoutMs = config.requestTimeoutMs;
		this.logger = logger ?? new LoggerImpl("push-client");
	}

	getUrl(): string {
		return this.url;
	}

	async push(body: Uint8Array): Promise<PushResponse> {
		const tries = this.transportRetries + 1;
		let lastError: unknown = null;

		for (let attempt = 1; attempt <= tries; attempt++) {
			if (attempt > 1) {
				this.logger.warn(`Push request failed (${formatError(lastError)}), retry ${attempt - 1}/${this.transportRetries}`);
				await this.wait(this.transportRetryDelayMs);
			}
			try {
				return await this.send(body);
			} catch (err) {
				lastError = err;
			}
		}

		throw new PushTransportError(tries, formatError(lastError));
	}

	private async send(body: Uint8Array): Promise<PushResponse> {
		const controller = new AbortController();
		const timeoutId = setTimeout(() => controller.abort(), this.requestTimeoutMs);

		try {
			const response = await fetch(this.url, {
				method: "POST",
				headers: {
					Authorization: this.authorization,
					"Content-Type": "application/octet-stream",
				},
				body,
				signal: controller.signal,
			});
			const text = await response.text();
			this.logger.debug(`Push endpoint answered status ${response.status}`);
			return { status: response.status, body: text };
		} catch (err) {
			if (err instanceof Error && err.name === "AbortError") {
				throw new Error("Request timeout");
			}
			throw err;
		} finally {
			clearTimeout(timeoutId);
		}
	}
}
