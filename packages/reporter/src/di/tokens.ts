/**
 * Injection tokens (identifiers) for all dependencies in the reporter package.
 * Uses inversify-style Symbol identifiers for type-safe dependency injection.
 */

import type { Platform } from "@instance-reporter/shared";
import type {
	InstanceDataFile,
	Logger,
	MetadataCollector,
	MetadataSource,
	PushClient,
	PushLoop,
	Reporter,
	ReporterConfig,
} from "../types/index.js";

/**
 * Token type for identifying dependencies in the container.
 * Using symbols ensures type safety and avoids string collision.
 */
export type Token<T> = symbol & { __type?: T };

/**
 * Creates a typed injection token using Symbol.for for consistency.
 */
export function createToken<T>(description: string): Token<T> {
	return Symbol.for(description) as Token<T>;
}

// ============================================================================
// Configuration
// ============================================================================

export const CONFIG = createToken<ReporterConfig>("ReporterConfig");

// ============================================================================
// Logging
// ============================================================================

export const LOGGER = createToken<Logger>("Logger");

/**
 * Token for a logger factory that creates prefixed loggers.
 */
export type LoggerFactory = (prefix: string) => Logger;
export const LOGGER_FACTORY = createToken<LoggerFactory>("LoggerFactory");

// ============================================================================
// Collection
// ============================================================================

export const HOST_IDENTITY_SOURCE = createToken<MetadataSource>("HostIdentitySource");

/**
 * Type for the metadata source registry (map of cloud platform to source).
 */
export type MetadataSourceRegistry = Map<Exclude<Platform, "none">, MetadataSource>;
export const METADATA_SOURCE_REGISTRY = createToken<MetadataSourceRegistry>("MetadataSourceRegistry");

export const METADATA_COLLECTOR = createToken<MetadataCollector>("MetadataCollector");

export const INSTANCE_DATA_FILE = createToken<InstanceDataFile>("InstanceDataFile");

// ============================================================================
// Delivery
// ============================================================================

export const PUSH_CLIENT = createToken<PushClient>("PushClient");

export const PUSH_LOOP = createToken<PushLoop>("PushLoop");

export const REPORTER = createToken<Reporter>("Reporter");

// ============================================================================
// Token groups for documentation
// ============================================================================

export const TOKENS = {
	CONFIG,
	LOGGER,
	LOGGER_FACTORY,
	HOST_IDENTITY_SOURCE,
	METADATA_SOURCE_REGISTRY,
	METADATA_COLLECTOR,
	INSTANCE_DATA_FILE,
	PUSH_CLIENT,
	PUSH_LOOP,
	REPORTER,
} as const;
