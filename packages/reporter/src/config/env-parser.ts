/**
 * Environment variable parsing utilities for reporter configuration.
 */

/**
 * Read an integer variable. Values that do not parse or fall below `min` are ignored.
 */
export function parseEnvNumber(key: string, min = 0): number | undefined {
	const value = process.env[key];
	if (value === undefined) {
		return undefined;
	}
	const parsed = parseInt(value, 10);
	return isNaN(parsed) || parsed < min ? undefined : parsed;
}

export interface ParsedEnv {
	metadataServiceUrl?: string;
	maxPushAttempts?: number;
	pushRetryDelayMs?: number;
	transportRetries?: number;
	transportRetryDelayMs?: number;
	requestTimeoutMs?: number;
}

export function parseEnvVars(): ParsedEnv {
	return {
		metadataServiceUrl: process.env.INSTANCE_METADATA_URL || undefined,
		maxPushAttempts: parseEnvNumber("PUSH_MAX_ATTEMPTS", 1),
		pushRetryDelayMs: parseEnvNumber("PUSH_RETRY_DELAY_MS"),
		transportRetries: parseEnvNumber("PUSH_TRANSPORT_RETRIES"),
		transportRetryDelayMs: parseEnvNumber("PUSH_TRANSPORT_RETRY_DELAY_MS"),
		requestTimeoutMs: parseEnvNumber("HTTP_REQUEST_TIMEOUT_MS", 1),
	};
}
