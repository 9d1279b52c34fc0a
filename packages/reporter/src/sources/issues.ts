import type { MetadataIssue, MetadataIssueSource } from "@instance-reporter/shared";
import { MetadataError } from "../errors/index.js";

/**
 * Turn a metadata failure into an issue. Anything else is rethrown.
 */
export function toIssue(source: MetadataIssueSource, err: unknown): MetadataIssue {
	if (err instanceof MetadataError) {
		return { source, kind: err.kind, detail: err.message };
	}
	throw err;
}

/**
 * Returns the parse error message, or null when the text is valid JSON.
 */
export function jsonParseError(text: string): string | null {
	try {
		JSON.parse(text);
		return null;
	} catch (err) {
		return err instanceof Error ? err.message : String(err);
	}
}
