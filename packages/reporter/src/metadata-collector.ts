import type { InstanceData, MetadataIssue, Platform } from "@instance-reporter/shared";
import { PLATFORM } from "@instance-reporter/shared";
import type { Logger, MetadataCollector, MetadataSource } from "./types";
import type { MetadataSourceRegistry } from "./di";
import { ReporterError } from "./errors";
import { LoggerImpl } from "./logger";

/**
 * Collector implementation that concatenates host identity and the platform document.
 * Collection problems are logged and returned, never thrown.
 */
export class MetadataCollectorImpl implements MetadataCollector {
	private readonly logger: Logger;

	constructor(
		private readonly hostIdentity: MetadataSource,
		private readonly registry: MetadataSourceRegistry,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("collector");
	}

	async collect(platform: Platform): Promise<InstanceData> {
		const segments = [await this.hostIdentity.collect()];

		if (platform !== PLATFORM.NONE) {
			const source = this.registry.get(platform);
			if (!source) {
				throw new ReporterError(`No metadata source registered for platform: ${platform}`);
			}
			segments.push(await source.collect());
		}

		const issues: MetadataIssue[] = segments.flatMap(segment => segment.issues);
		for (const issue of issues) {
			this.logger.warn(`${issue.source} metadata (${issue.kind}): ${issue.detail}`);
		}

		const payload = segments.map(segment => segment.text).join("");
		this.logger.info(`Collected ${platform} instance data (${payload.length} chars, ${issues.length} issues)`);

		return { payload, issues };
	}
}
