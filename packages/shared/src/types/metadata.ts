import type { Platform } from "./platform.js";

/**
 * Issue kinds recorded while collecting instance data.
 */
export const METADATA_ISSUE_KIND = {
	/** Request threw or timed out */
	UNREACHABLE: "unreachable",
	/** Service answered with a non-2xx status */
	HTTP_STATUS: "http-status",
	/** Document is not valid JSON */
	MALFORMED: "malformed",
	/** Host identity command failed to run */
	COMMAND_FAILED: "command-failed",
} as const;

export type MetadataIssueKind = (typeof METADATA_ISSUE_KIND)[keyof typeof METADATA_ISSUE_KIND];

/** Where an issue came from. */
export type MetadataIssueSource = "host-identity" | Exclude<Platform, "none">;

/**
 * A collection problem. Issues are diagnostics only: the payload is
 * forwarded regardless.
 */
export interface MetadataIssue {
	source: MetadataIssueSource;
	kind: MetadataIssueKind;
	detail: string;
}

/**
 * Result of one collection run.
 */
export interface InstanceData {
	/** Host identity text followed by the platform document, forwarded as-is */
	payload: string;
	issues: MetadataIssue[];
}
