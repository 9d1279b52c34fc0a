/**
 * Reporter run: startup validation, then one collect and push cycle.
 * Maps every outcome to a process exit code.
 */

import { REPORTER_PATHS } from "@instance-reporter/shared";
import type { ReporterConfig } from "./types";
import { parseCliArgs, resolveConfig } from "./config";
import { type Container, LOGGER, REPORTER, createReporterContainer } from "./di";
import { ReporterError, UsageError } from "./errors";
import { ensureLogFile } from "./logger";
import { formatError } from "./utils";

export const PROGRAM_NAME = "report-instance-data";

export function usage(): string {
	return `USAGE for ${PROGRAM_NAME}:

${PROGRAM_NAME} -c <config_file> [-m <metrics_root>] [-aws|-azure|-none]

   or

${PROGRAM_NAME} -h

    <config_file>  is the key=value file holding metrics_host, metrics_customer,
                   metrics_instance, metrics_user and metrics_passwd
                   - default: ${REPORTER_PATHS.DEFAULT_CONFIG_FILE}
    <metrics_root> is the directory where metrics are being written
                   - default: ${REPORTER_PATHS.DEFAULT_METRICS_ROOT}
    -aws           Collect the AWS instance identity document (default)
    -azure         Collect the Azure instance metadata document
    -none          Collect host identity only

Collects metadata about the current instance and pushes the data centrally.
`;
}

export interface RunOptions {
	/** Adjust registrations before the reporter is resolved */
	configure?: (container: Container) => void;
}

/**
 * Run the reporter for the given CLI arguments.
 * @returns the process exit code.
 */
export async function runReporter(args: string[], options: RunOptions = {}): Promise<number> {
	let config: ReporterConfig;
	try {
		const cli = parseCliArgs(args);
		if (cli.help) {
			console.log(usage());
			return 0;
		}
		config = resolveConfig(cli);
		ensureLogFile(config.logFile);
	} catch (err) {
		if (err instanceof UsageError) {
			console.error(`\nUsage Error:\n\n${err.message}\n`);
			console.error(usage());
			return err.exitCode;
		}
		if (err instanceof ReporterError) {
			console.error(`\nError: ${err.message}\n`);
			return err.exitCode;
		}
		throw err;
	}

	const container = createReporterContainer(config);
	options.configure?.(container);
	const logger = container.resolve(LOGGER);

	try {
		await container.resolve(REPORTER).run();
		return 0;
	} catch (err) {
		logger.error(`Reporter failed: ${formatError(err)}`);
		return err instanceof ReporterError ? err.exitCode : 1;
	}
}
