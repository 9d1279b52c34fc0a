import type { PushAttempt } from "@instance-reporter/shared";
import type {
	InstanceDataFile,
	Logger,
	MetadataCollector,
	PushLoop,
	Reporter,
	ReporterConfig,
} from "./types";

/**
 * Reporter implementation: collect instance data, write it to the
 * instance data file, then push the file contents.
 */
export class ReporterImpl implements Reporter {
	constructor(
		private readonly config: ReporterConfig,
		private readonly logger: Logger,
		private readonly collector: MetadataCollector,
		private readonly dataFile: InstanceDataFile,
		private readonly pushLoop: PushLoop,
	) {}

	async run(): Promise<PushAttempt[]> {
		this.logger.info(`Reporting ${this.config.platform} instance data for ${this.config.metricsCustomer}/${this.config.metricsInstance}`);

		const { payload, issues } = await this.collector.collect(this.config.platform);
		if (issues.length > 0) {
			this.logger.warn(`Pushing instance data despite ${issues.length} collection issue(s)`);
		}

		this.dataFile.write(payload);
		const attempts = await this.pushLoop.run(this.dataFile.read());

		this.logger.info(`Instance data delivered after ${attempts.length} attempt(s)`);
		return attempts;
	}
}
