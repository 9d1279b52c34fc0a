import type { InstanceData, Platform } from "@instance-reporter/shared";

/**
 * Collects host identity and the platform metadata document into one payload.
 */
export interface MetadataCollector {
	collect(platform: Platform): Promise<InstanceData>;
}
