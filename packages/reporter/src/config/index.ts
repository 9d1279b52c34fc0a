/**
 * Reporter configuration module.
 *
 * Build the reporter configuration from CLI arguments, the config file,
 * environment variables, and defaults.
 * Priority: CLI > Config file > Environment > Defaults
 */

import type { ReporterConfig } from "../types/index.js";
import { type ParsedArgs, parseCliArgs } from "./cli-parser.js";
import { readConfigFile } from "./config-file.js";
import { getDefaultConfig } from "./defaults.js";
import { parseEnvVars } from "./env-parser.js";
import { normalizePushHost } from "./host.js";

export { parseCliArgs, type ParsedArgs } from "./cli-parser.js";
export { REQUIRED_CONFIG_KEYS, parseConfigText, readConfigFile, type ConfigFileValues } from "./config-file.js";
export { normalizePushHost } from "./host.js";

/**
 * Resolve the configuration for already parsed CLI arguments.
 * Reads the config file; nothing touches the network.
 */
export function resolveConfig(cli: ParsedArgs): ReporterConfig {
	const env = parseEnvVars();
	const defaults = getDefaultConfig();

	const configFile = cli.configFile ?? defaults.configFile;
	const file = readConfigFile(configFile);

	return Object.freeze({
		metricsHost: normalizePushHost(file.metricsHost),
		metricsCustomer: file.metricsCustomer,
		metricsInstance: file.metricsInstance,
		metricsUser: file.metricsUser,
		metricsPassword: file.metricsPassword,
		configFile,
		metricsRoot: cli.metricsRoot ?? defaults.metricsRoot,
		platform: cli.platform ?? defaults.platform,
		logFile: file.metadataLogfile ?? defaults.logFile,
		metadataServiceUrl: env.metadataServiceUrl ?? defaults.metadataServiceUrl,
		maxPushAttempts: env.maxPushAttempts ?? defaults.maxPushAttempts,
		pushRetryDelayMs: env.pushRetryDelayMs ?? defaults.pushRetryDelayMs,
		transportRetries: env.transportRetries ?? defaults.transportRetries,
		transportRetryDelayMs: env.transportRetryDelayMs ?? defaults.transportRetryDelayMs,
		requestTimeoutMs: env.requestTimeoutMs ?? defaults.requestTimeoutMs,
	});
}

/**
 * Load reporter configuration from CLI arguments.
 * @throws UsageError, ConfigFileNotFoundError or MissingConfigValuesError.
 */
export function loadConfig(args: string[]): ReporterConfig {
	return resolveConfig(parseCliArgs(args));
}
