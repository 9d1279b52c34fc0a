import type { MetadataIssue } from "@instance-reporter/shared";

/**
 * One segment of the payload with the issues met while producing it.
 */
export interface MetadataSegment {
	text: string;
	issues: MetadataIssue[];
}

/**
 * A source of payload text: host identity or a cloud metadata document.
 * Sources never throw for collection failures; they report issues instead.
 */
export interface MetadataSource {
	collect(): Promise<MetadataSegment>;
}
