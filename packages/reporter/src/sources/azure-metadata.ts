import { AZURE_METADATA, type MetadataIssue, PLATFORM } from "@instance-reporter/shared";
import type { Logger, MetadataSegment, MetadataSource } from "../types/index.js";
import { MalformedMetadataError, MetadataResponseError } from "../errors/index.js";
import { LoggerImpl } from "../logger/index.js";
import { fetchMetadata } from "./metadata-http.js";
import { toIssue } from "./issues.js";
import { prettyPrintJson } from "./json-indent.js";

export interface AzureMetadataOptions {
	metadataServiceUrl: string;
	requestTimeoutMs: number;
}

/**
 * Source for the Azure instance metadata document.
 * Node's fetch never routes through a proxy, so the link-local address is reached directly.
 */
export class AzureMetadataSource implements MetadataSource {
	private readonly logger: Logger;

	constructor(
		private readonly options: AzureMetadataOptions,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("azure-metadata");
	}

	getDocumentUrl(): string {
		return `${this.options.metadataServiceUrl}${AZURE_METADATA.INSTANCE_PATH}?api-version=${AZURE_METADATA.API_VERSION}`;
	}

	async collect(): Promise<MetadataSegment> {
		const url = this.getDocumentUrl();
		const issues: MetadataIssue[] = [];

		this.logger.debug(`Requesting instance metadata from ${url}`);
		let body: string;
		let fetched = true;
		try {
			body = await fetchMetadata(url, {
				method: "GET",
				headers: { [AZURE_METADATA.REQUIRED_HEADER]: "true" },
			}, this.options.requestTimeoutMs);
		} catch (err) {
			issues.push(toIssue(PLATFORM.AZURE, err));
			body = err instanceof MetadataResponseError ? err.body : "";
			fetched = false;
		}

		const pretty = prettyPrintJson(body);
		if (pretty === null && fetched) {
			issues.push(toIssue(PLATFORM.AZURE, new MalformedMetadataError(url, "document is not valid JSON")));
		}

		// A document that does not parse contributes an empty line
		return { text: `${pretty ?? ""}\n`, issues };
	}
}
