/**
 * Composition root for the reporter package.
 * Wires all dependencies together using the inversify-based DI container.
 */

import "reflect-metadata";
import { PLATFORM } from "@instance-reporter/shared";
import type { ReporterConfig } from "../types";
import { ReporterImpl } from "../reporter";
import { MetadataCollectorImpl } from "../metadata-collector";
import { InstanceDataFileImpl } from "../instance-data-file";
import { PushClientImpl } from "../push-client";
import { PushLoopImpl } from "../push-loop";
import { LoggerImpl } from "../logger";
import { AwsMetadataSource, AzureMetadataSource, HostIdentitySource } from "../sources";
import { type Container, createContainer } from "./container";
import {
	CONFIG,
	HOST_IDENTITY_SOURCE,
	INSTANCE_DATA_FILE,
	LOGGER,
	LOGGER_FACTORY,
	type LoggerFactory,
	METADATA_COLLECTOR,
	METADATA_SOURCE_REGISTRY,
	type MetadataSourceRegistry,
	PUSH_CLIENT,
	PUSH_LOOP,
	REPORTER,
} from "./tokens";

/**
 * Configure all dependencies in the container.
 * This is the single place where all wiring happens.
 */
export function configureContainer(container: Container, config: ReporterConfig): void {
	container.instance(CONFIG, config);

	// Every logger writes to the console and the configured log file
	container.singleton<LoggerFactory>(LOGGER_FACTORY, (c: Container) => {
		const { logFile } = c.resolve(CONFIG);
		return (prefix: string) => new LoggerImpl(prefix, { logFile });
	});

	container.singleton(LOGGER, (c: Container) => {
		const factory = c.resolve(LOGGER_FACTORY);
		return factory("reporter");
	});

	container.singleton(HOST_IDENTITY_SOURCE, (c: Container) => {
		const factory = c.resolve(LOGGER_FACTORY);
		return new HostIdentitySource(factory("host-identity"));
	});

	container.singleton<MetadataSourceRegistry>(METADATA_SOURCE_REGISTRY, (c: Container) => {
		const cfg = c.resolve(CONFIG);
		const factory = c.resolve(LOGGER_FACTORY);
		const options = {
			metadataServiceUrl: cfg.metadataServiceUrl,
			requestTimeoutMs: cfg.requestTimeoutMs,
		};

		const registry: MetadataSourceRegistry = new Map();
		registry.set(PLATFORM.AWS, new AwsMetadataSource(options, factory("aws-metadata")));
		registry.set(PLATFORM.AZURE, new AzureMetadataSource(options, factory("azure-metadata")));

		return registry;
	});

	container.singleton(METADATA_COLLECTOR, (c: Container) => {
		const factory = c.resolve(LOGGER_FACTORY);
		return new MetadataCollectorImpl(
			c.resolve(HOST_IDENTITY_SOURCE),
			c.resolve(METADATA_SOURCE_REGISTRY),
			factory("collector"),
		);
	});

	container.singleton(INSTANCE_DATA_FILE, (c: Container) => {
		const cfg = c.resolve(CONFIG);
		const factory = c.resolve(LOGGER_FACTORY);
		return new InstanceDataFileImpl(cfg.metricsRoot, factory("instance-data"));
	});

	container.singleton(PUSH_CLIENT, (c: Container) => {
		const cfg = c.resolve(CONFIG);
		const factory = c.resolve(LOGGER_FACTORY);
		return new PushClientImpl(cfg, factory("push-client"));
	});

	container.singleton(PUSH_LOOP, (c: Container) => {
		const cfg = c.resolve(CONFIG);
		const factory = c.resolve(LOGGER_FACTORY);
		return new PushLoopImpl(
			c.resolve(PUSH_CLIENT),
			{ maxAttempts: cfg.maxPushAttempts, retryDelayMs: cfg.pushRetryDelayMs },
			factory("push"),
		);
	});

	container.singleton(REPORTER, (c: Container) => {
		return new ReporterImpl(
			c.resolve(CONFIG),
			c.resolve(LOGGER),
			c.resolve(METADATA_COLLECTOR),
			c.resolve(INSTANCE_DATA_FILE),
			c.resolve(PUSH_LOOP),
		);
	});
}

/**
 * Create and configure a container with all dependencies for the given config.
 */
export function createReporterContainer(config: ReporterConfig): Container {
	const container = createContainer();
	configureContainer(container, config);
	return container;
}

/**
 * Create and return the reporter from a fully configured container.
 */
export function createReporter(config: ReporterConfig): ReporterImpl {
	const container = createReporterContainer(config);
	const reporter = container.resolve(REPORTER);
	if (!(reporter instanceof ReporterImpl)) {
		throw new Error("Reporter registration does not resolve to ReporterImpl");
	}
	return reporter;
}
