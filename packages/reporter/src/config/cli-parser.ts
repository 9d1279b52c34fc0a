/**
 * CLI argument parsing for reporter configuration.
 *
 * Flags follow the single-dash style of the cron job they replace:
 * `-c <config_file> [-m <metrics_root>] [-aws|-azure|-none]` or `-h`.
 */

import { PLATFORM, type Platform } from "@instance-reporter/shared";
import { UsageError } from "../errors/index.js";

export interface ParsedArgs {
	help?: boolean;
	configFile?: string;
	metricsRoot?: string;
	platform?: Platform;
}

function takeValue(args: string[], index: number, flag: string): string {
	const value = args[index];
	if (value === undefined || value === "") {
		throw new UsageError(`Incorrect number of arguments: ${flag} requires a value.`);
	}
	return value;
}

export function parseCliArgs(args: string[]): ParsedArgs {
	const parsed: ParsedArgs = {};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === "-h") {
			// Help wins over anything after it
			parsed.help = true;
			return parsed;
		} else if (arg === "-c") {
			parsed.configFile = takeValue(args, ++i, arg);
		} else if (arg === "-m") {
			parsed.metricsRoot = takeValue(args, ++i, arg);
		} else if (arg === "-aws") {
			parsed.platform = PLATFORM.AWS;
		} else if (arg === "-azure") {
			parsed.platform = PLATFORM.AZURE;
		} else if (arg === "-none") {
			parsed.platform = PLATFORM.NONE;
		} else if (arg.startsWith("-")) {
			throw new UsageError(`Unknown command line option (${arg}).`);
		} else {
			throw new UsageError(`Unexpected argument (${arg}).`);
		}
	}

	return parsed;
}
