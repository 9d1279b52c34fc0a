/**
 * Default configuration values for the reporter.
 */

import {
	METADATA_SERVICE_URL,
	PLATFORM,
	PUSH_DEFAULTS,
	type Platform,
	REPORTER_PATHS,
} from "@instance-reporter/shared";

export interface DefaultConfig {
	configFile: string;
	metricsRoot: string;
	platform: Platform;
	logFile: string;
	metadataServiceUrl: string;
	maxPushAttempts: number;
	pushRetryDelayMs: number;
	transportRetries: number;
	transportRetryDelayMs: number;
	requestTimeoutMs: number;
}

export function getDefaultConfig(): DefaultConfig {
	return {
		configFile: REPORTER_PATHS.DEFAULT_CONFIG_FILE,
		metricsRoot: REPORTER_PATHS.DEFAULT_METRICS_ROOT,
		platform: PLATFORM.AWS,
		logFile: REPORTER_PATHS.DEFAULT_LOG_FILE,
		metadataServiceUrl: METADATA_SERVICE_URL,
		maxPushAttempts: PUSH_DEFAULTS.MAX_ATTEMPTS,
		pushRetryDelayMs: PUSH_DEFAULTS.RETRY_DELAY_MS,
		transportRetries: PUSH_DEFAULTS.TRANSPORT_RETRIES,
		transportRetryDelayMs: PUSH_DEFAULTS.TRANSPORT_RETRY_DELAY_MS,
		requestTimeoutMs: PUSH_DEFAULTS.REQUEST_TIMEOUT_MS,
	};
}
