/**
 * Shared constants for the reporter.
 *
 * Constants are organized into domain-specific groups for easier discovery.
 */

// =============================================================================
// Metadata Service
// =============================================================================

/** Link-local address of the cloud instance metadata service */
export const METADATA_SERVICE_URL = "http://169.254.169.254";

/**
 * AWS instance metadata (IMDSv2) endpoints and headers.
 */
export const AWS_METADATA = {
	/** Session token endpoint, requested with PUT */
	TOKEN_PATH: "/latest/api/token",
	/** Instance identity document endpoint */
	IDENTITY_DOCUMENT_PATH: "/latest/dynamic/instance-identity/document",
	/** Header carrying the requested token lifetime */
	TOKEN_TTL_HEADER: "X-aws-ec2-metadata-token-ttl-seconds",
	/** Header carrying the session token */
	TOKEN_HEADER: "X-aws-ec2-metadata-token",
	/** Requested token lifetime in seconds (6 hours) */
	TOKEN_TTL_SECONDS: 21_600,
} as const;

/**
 * Azure instance metadata endpoint and headers.
 */
export const AZURE_METADATA = {
	INSTANCE_PATH: "/metadata/instance",
	API_VERSION: "2021-02-01",
	/** Azure rejects requests without this header */
	REQUIRED_HEADER: "Metadata",
	/** Indentation used when pretty-printing the instance document */
	INDENT: 4,
} as const;

// =============================================================================
// Push Defaults
// =============================================================================

/** Maximum push attempts before giving up */
export const MAX_PUSH_ATTEMPTS = 10;
/** Fixed delay before every push attempt, including the first */
export const PUSH_RETRY_DELAY_MS = 1_000;
/** Request timeout for every HTTP call */
export const HTTP_REQUEST_TIMEOUT_MS = 30_000;

/**
 * Grouped push-related constants.
 */
export const PUSH_DEFAULTS = {
	MAX_ATTEMPTS: MAX_PUSH_ATTEMPTS,
	RETRY_DELAY_MS: PUSH_RETRY_DELAY_MS,
	/** Extra tries the push client makes on connection-level failure */
	TRANSPORT_RETRIES: 5,
	/** Delay between transport-level tries */
	TRANSPORT_RETRY_DELAY_MS: 1_000,
	REQUEST_TIMEOUT_MS: HTTP_REQUEST_TIMEOUT_MS,
} as const;

/**
 * Port suffixes of the pushgateway and of the data push gateway that
 * accepts instance data. Hosts configured for the former are rewritten.
 */
export const PUSH_PORTS = {
	PUSHGATEWAY_SUFFIX: "9091",
	DATA_PUSH_SUFFIX: "9092",
} as const;

/**
 * Response body the push endpoint intermittently returns for valid
 * credentials. See isKnownTransientAuthFailure in the reporter package.
 */
export const KNOWN_TRANSIENT_AUTH_FAILURE_BODY = '{"message":"invalid username or password"}';

// =============================================================================
// Reporter Paths
// =============================================================================

/**
 * Default locations used when no CLI flag or config key overrides them.
 */
export const REPORTER_PATHS = {
	DEFAULT_CONFIG_FILE: "/p4/common/config/.push_metrics.cfg",
	DEFAULT_METRICS_ROOT: "/p4/metrics",
	DEFAULT_LOG_FILE: "/p4/1/logs/report_instance_data.log",
	/** Name of the transient payload file written under the metrics root */
	INSTANCE_DATA_FILENAME: "_instance_data.log",
} as const;

/** Timeout for the host identity command */
export const HOST_IDENTITY_TIMEOUT_MS = 5_000;
