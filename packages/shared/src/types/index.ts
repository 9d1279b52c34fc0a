export { PLATFORM, isPlatform, type Platform } from "./platform.js";
export {
	METADATA_ISSUE_KIND,
	type InstanceData,
	type MetadataIssue,
	type MetadataIssueKind,
	type MetadataIssueSource,
} from "./metadata.js";
export type { PushAttempt, PushResponse } from "./push.js";
