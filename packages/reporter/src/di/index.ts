/**
 * Dependency Injection module exports.
 */

// Re-export reflect-metadata to ensure it's loaded
import "reflect-metadata";

export { ContainerImpl, createContainer, type Container, type Factory } from "./container.js";
export {
	CONFIG,
	HOST_IDENTITY_SOURCE,
	INSTANCE_DATA_FILE,
	LOGGER,
	LOGGER_FACTORY,
	METADATA_COLLECTOR,
	METADATA_SOURCE_REGISTRY,
	PUSH_CLIENT,
	PUSH_LOOP,
	REPORTER,
	TOKENS,
	createToken,
	type LoggerFactory,
	type MetadataSourceRegistry,
	type Token,
} from "./tokens.js";
export { configureContainer, createReporter, createReporterContainer } from "./composition-root.js";
