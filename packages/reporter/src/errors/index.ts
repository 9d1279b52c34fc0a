export { ReporterError } from "./reporter-error.js";
export { UsageError } from "./usage-error.js";
export { ConfigFileNotFoundError, MissingConfigValuesError } from "./config-errors.js";
export { LogFileError } from "./log-file-error.js";
export { PushTransportError, RetriesExhaustedError } from "./push-errors.js";
export {
	MalformedMetadataError,
	MetadataError,
	MetadataResponseError,
	MetadataUnreachableError,
} from "./metadata-errors.js";
