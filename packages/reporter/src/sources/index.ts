export { AwsMetadataSource, type AwsMetadataOptions } from "./aws-metadata.js";
export { AzureMetadataSource, type AzureMetadataOptions } from "./azure-metadata.js";
export { prettyPrintJson } from "./json-indent.js";
export { HostIdentitySource, describeHost, runCommand, type CommandRunner } from "./host-identity.js";
export { fetchMetadata } from "./metadata-http.js";
