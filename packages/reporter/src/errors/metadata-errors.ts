import { METADATA_ISSUE_KIND, type MetadataIssueKind } from "@instance-reporter/shared";
import { ReporterError } from "./reporter-error.js";

/**
 * Base class for metadata collection failures.
 * These never end the run; sources turn them into issues.
 */
export abstract class MetadataError extends ReporterError {
	abstract readonly kind: MetadataIssueKind;
}

/**
 * Thrown when the metadata service cannot be reached or times out
 */
export class MetadataUnreachableError extends MetadataError {
	readonly kind = METADATA_ISSUE_KIND.UNREACHABLE;

	constructor(url: string, reason: string) {
		super(`Metadata service unreachable at ${url}: ${reason}`);
	}
}

/**
 * Thrown when the metadata service answers with a non-2xx status
 */
export class MetadataResponseError extends MetadataError {
	readonly kind = METADATA_ISSUE_KIND.HTTP_STATUS;
	readonly status: number;
	readonly body: string;

	constructor(url: string, status: number, body: string) {
		super(`Metadata service returned status ${status} for ${url}`);
		this.status = status;
		this.body = body;
	}
}

/**
 * Thrown when a metadata document is not valid JSON
 */
export class MalformedMetadataError extends MetadataError {
	readonly kind = METADATA_ISSUE_KIND.MALFORMED;

	constructor(url: string, reason: string) {
		super(`Malformed metadata document from ${url}: ${reason}`);
	}
}
