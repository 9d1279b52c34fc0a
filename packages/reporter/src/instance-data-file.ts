import * as fs from "node:fs";
import * as path from "node:path";
import { REPORTER_PATHS } from "@instance-reporter/shared";
import type { InstanceDataFile, Logger } from "./types";
import { ReporterError } from "./errors";
import { LoggerImpl } from "./logger";
import { formatError } from "./utils";

/**
 * Instance data file implementation.
 * The payload is written once per run and read back as the request body, byte for byte.
 */
export class InstanceDataFileImpl implements InstanceDataFile {
	private readonly filePath: string;
	private readonly logger: Logger;

	constructor(
		private readonly metricsRoot: string,
		logger?: Logger,
	) {
		this.filePath = path.join(metricsRoot, REPORTER_PATHS.INSTANCE_DATA_FILENAME);
		this.logger = logger ?? new LoggerImpl("instance-data");
	}

	getPath(): string {
		return this.filePath;
	}

	write(payload: string): void {
		try {
			fs.mkdirSync(this.metricsRoot, { recursive: true });
			fs.writeFileSync(this.filePath, payload, "utf-8");
		} catch (err) {
			throw new ReporterError(`Could not write ${this.filePath}: ${formatError(err)}`);
		}
		this.logger.debug(`Wrote instance data to ${this.filePath}`);
	}

	read(): Buffer {
		try {
			return fs.readFileSync(this.filePath);
		} catch (err) {
			throw new ReporterError(`Could not read ${this.filePath}: ${formatError(err)}`);
		}
	}
}
