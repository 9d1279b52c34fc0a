import { ReporterError } from "./reporter-error.js";

/**
 * Thrown when the config file does not exist or is not a regular file
 */
export class ConfigFileNotFoundError extends ReporterError {
	readonly configFile: string;

	constructor(configFile: string) {
		super(`Can't find config file: ${configFile}!`);
		this.configFile = configFile;
	}
}

/**
 * Thrown when required values are absent or empty in the config file
 */
export class MissingConfigValuesError extends ReporterError {
	readonly missingKeys: readonly string[];

	constructor(configFile: string, missingKeys: readonly string[]) {
		super(`Required parameters not supplied: ${missingKeys.join(", ")}. `
			+ `You must set the variables metrics_host, metrics_user, metrics_passwd, metrics_customer, metrics_instance in ${configFile}.`);
		this.missingKeys = missingKeys;
	}
}
