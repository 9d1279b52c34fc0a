/**
 * Type definitions for the reporter package.
 */
export type { InstanceDataFile } from "./instance-data-file.js";
export type { Logger } from "./logger.js";
export type { MetadataCollector } from "./metadata-collector.js";
export type { MetadataSegment, MetadataSource } from "./metadata-source.js";
export type { PushClient } from "./push-client.js";
export type { PushLoop } from "./push-loop.js";
export type { Reporter } from "./reporter.js";
export type { ReporterConfig } from "./reporter-config.js";
