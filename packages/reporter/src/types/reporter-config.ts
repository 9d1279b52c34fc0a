import type { Platform } from "@instance-reporter/shared";

/**
 * Reporter configuration, built once at startup and never mutated.
 * Values are populated from CLI arguments, the config file, environment variables, or defaults.
 */
export interface ReporterConfig {
	/** Push endpoint base URL, port already normalized */
	readonly metricsHost: string;
	readonly metricsCustomer: string;
	readonly metricsInstance: string;
	readonly metricsUser: string;
	readonly metricsPassword: string;
	readonly configFile: string;
	/** Directory holding the transient payload file */
	readonly metricsRoot: string;
	readonly platform: Platform;
	readonly logFile: string;
	/** Base URL of the instance metadata service */
	readonly metadataServiceUrl: string;
	readonly maxPushAttempts: number;
	readonly pushRetryDelayMs: number;
	readonly transportRetries: number;
	readonly transportRetryDelayMs: number;
	readonly requestTimeoutMs: number;
}
