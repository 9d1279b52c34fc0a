import { KNOWN_TRANSIENT_AUTH_FAILURE_BODY } from "@instance-reporter/shared";

/**
 * The push endpoint intermittently answers valid credentials with
 * `{"message":"invalid username or password"}`. Only that exact body
 * (trailing newlines aside) is treated as transient; any other body,
 * genuine errors included, counts as delivered.
 *
 * Update KNOWN_TRANSIENT_AUTH_FAILURE_BODY if the upstream wording changes.
 */
export function isKnownTransientAuthFailure(body: string): boolean {
	return body.replace(/\n+$/, "") === KNOWN_TRANSIENT_AUTH_FAILURE_BODY;
}
