/**
 * Reporter package public API
 *
 * This module exports the reporter entry points, configuration and components.
 */

// Entry points
export { runReporter, usage, type RunOptions } from "./run.js";
export { ReporterImpl } from "./reporter.js";

// Configuration
export { loadConfig, normalizePushHost, parseCliArgs, parseConfigText, resolveConfig } from "./config/index.js";

// Class implementations
export { LoggerImpl, ensureLogFile, setLogLevel } from "./logger/index.js";
export { MetadataCollectorImpl } from "./metadata-collector.js";
export { InstanceDataFileImpl } from "./instance-data-file.js";
export { PushClientImpl, buildPushUrl } from "./push-client.js";
export { PushLoopImpl, type PushLoopOptions } from "./push-loop.js";
export { isKnownTransientAuthFailure } from "./transient-failure.js";
export { AwsMetadataSource, AzureMetadataSource, HostIdentitySource, type CommandRunner } from "./sources/index.js";

// Errors
export * from "./errors/index.js";

// Interface types
export type * from "./types/index.js";

// Dependency Injection
export {
	ContainerImpl,
	createContainer,
	createToken,
	createReporter,
	createReporterContainer,
	configureContainer,
	TOKENS,
} from "./di/index.js";
export type { Container, Factory, LoggerFactory, MetadataSourceRegistry, Token } from "./di/index.js";
