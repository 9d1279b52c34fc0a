/**
 * Parsing of the key=value config file shared with the metrics push job.
 */

import * as fs from "node:fs";
import { ConfigFileNotFoundError, MissingConfigValuesError, ReporterError } from "../errors/index.js";
import { formatError } from "../utils/index.js";

export const REQUIRED_CONFIG_KEYS = [
	"metrics_host",
	"metrics_customer",
	"metrics_instance",
	"metrics_user",
	"metrics_passwd",
] as const;

export type RequiredConfigKey = (typeof REQUIRED_CONFIG_KEYS)[number];

/**
 * Values read from the config file. Required values are non-empty.
 */
export interface ConfigFileValues {
	metricsHost: string;
	metricsCustomer: string;
	metricsInstance: string;
	metricsUser: string;
	metricsPassword: string;
	metadataLogfile?: string;
}

/**
 * Parse key=value lines. Blank lines and lines starting with # are skipped,
 * the value is everything after the first "=", and a repeated key keeps its last value.
 */
export function parseConfigText(text: string): Map<string, string> {
	const entries = new Map<string, string>();

	for (const rawLine of text.split(/\r?\n/)) {
		const line = rawLine.trim();
		if (line === "" || line.startsWith("#")) {
			continue;
		}
		const separator = line.indexOf("=");
		if (separator <= 0) {
			continue;
		}
		entries.set(line.slice(0, separator).trim(), line.slice(separator + 1).trim());
	}

	return entries;
}

/**
 * Read and validate the config file.
 * @throws ConfigFileNotFoundError when the path is not a regular file.
 * @throws MissingConfigValuesError naming every required key that is absent or empty.
 */
export function readConfigFile(configFile: string): ConfigFileValues {
	if (!fs.existsSync(configFile) || !fs.statSync(configFile).isFile()) {
		throw new ConfigFileNotFoundError(configFile);
	}

	let text: string;
	try {
		text = fs.readFileSync(configFile, "utf-8");
	} catch (err) {
		throw new ReporterError(`Could not read config file ${configFile}: ${formatError(err)}`);
	}

	const entries = parseConfigText(text);
	const missing = REQUIRED_CONFIG_KEYS.filter(key => !entries.get(key));
	if (missing.length > 0) {
		throw new MissingConfigValuesError(configFile, missing);
	}

	const required = (key: RequiredConfigKey): string => entries.get(key) ?? "";
	const metadataLogfile = entries.get("metadata_logfile");

	return {
		metricsHost: required("metrics_host"),
		metricsCustomer: required("metrics_customer"),
		metricsInstance: required("metrics_instance"),
		metricsUser: required("metrics_user"),
		metricsPassword: required("metrics_passwd"),
		...(metadataLogfile ? { metadataLogfile } : {}),
	};
}
