/**
 * E2E Test Constants
 *
 * Values shared by the fixture and the scenarios.
 */

/**
 * Host identity text returned by the stubbed host identity source
 */
export const HOST_IDENTITY_TEXT = "   Static hostname: e2e-node\n  Operating System: Test Linux 1.0\n";

/**
 * Session token handed out by the mock AWS metadata service
 */
export const AWS_TOKEN = "e2e-session-token";

/**
 * Identity document served by the mock AWS metadata service
 */
export const AWS_DOCUMENT = '{"accountId":"000000000000","instanceId":"i-0e2e","region":"eu-west-1"}';

/**
 * Instance document served by the mock Azure metadata service, compact form
 */
export const AZURE_DOCUMENT = '{"compute":{"vmId":"vm-e2e","location":"westeurope"}}';

/**
 * Config file values for the e2e customer
 */
export const E2E_CUSTOMER = "e2e-customer";
export const E2E_INSTANCE = "e2e-instance";
export const E2E_USER = "e2e-user";
export const E2E_PASSWORD = "test-secret";

/**
 * Push endpoint reply for a delivered payload
 */
export const PUSH_OK_BODY = '{"status":"ok"}';
