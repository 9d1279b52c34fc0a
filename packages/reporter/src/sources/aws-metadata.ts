import { AWS_METADATA, type MetadataIssue, PLATFORM } from "@instance-reporter/shared";
import type { Logger, MetadataSegment, MetadataSource } from "../types/index.js";
import { MalformedMetadataError, MetadataResponseError } from "../errors/index.js";
import { LoggerImpl } from "../logger/index.js";
import { fetchMetadata } from "./metadata-http.js";
import { jsonParseError, toIssue } from "./issues.js";

export interface AwsMetadataOptions {
	metadataServiceUrl: string;
	requestTimeoutMs: number;
}

/**
 * Source for the AWS instance identity document (IMDSv2).
 * Requests a session token first, then the document with that token.
 * The raw document is forwarded as-is.
 */
export class AwsMetadataSource implements MetadataSource {
	private readonly logger: Logger;

	constructor(
		private readonly options: AwsMetadataOptions,
		logger?: Logger,
	) {
		this.logger = logger ?? new LoggerImpl("aws-metadata");
	}

	async collect(): Promise<MetadataSegment> {
		const issues: MetadataIssue[] = [];

		const token = await this.requestToken(issues);
		const document = await this.requestDocument(token, issues);

		// Trailing newlines collapse to one, as when the document is echoed
		return { text: `${document.replace(/\n+$/, "")}\n`, issues };
	}

	private async requestToken(issues: MetadataIssue[]): Promise<string | null> {
		const url = `${this.options.metadataServiceUrl}${AWS_METADATA.TOKEN_PATH}`;
		this.logger.debug(`Requesting metadata token from ${url}`);
		try {
			const token = await fetchMetadata(url, {
				method: "PUT",
				headers: { [AWS_METADATA.TOKEN_TTL_HEADER]: String(AWS_METADATA.TOKEN_TTL_SECONDS) },
			}, this.options.requestTimeoutMs);
			return token.trim();
		} catch (err) {
			issues.push(toIssue(PLATFORM.AWS, err));
			return null;
		}
	}

	private async requestDocument(token: string | null, issues: MetadataIssue[]): Promise<string> {
		const url = `${this.options.metadataServiceUrl}${AWS_METADATA.IDENTITY_DOCUMENT_PATH}`;
		// Without a token the request falls back to IMDSv1
		const headers: Record<string, string> = token ? { [AWS_METADATA.TOKEN_HEADER]: token } : {};

		this.logger.debug(`Requesting instance identity document from ${url}`);
		let document: string;
		try {
			document = await fetchMetadata(url, { method: "GET", headers }, this.options.requestTimeoutMs);
		} catch (err) {
			issues.push(toIssue(PLATFORM.AWS, err));
			return err instanceof MetadataResponseError ? err.body : "";
		}

		const parseError = jsonParseError(document);
		if (parseError !== null) {
			issues.push(toIssue(PLATFORM.AWS, new MalformedMetadataError(url, parseError)));
		}
		return document;
	}
}
