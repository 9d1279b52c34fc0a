import type { PushResponse } from "@instance-reporter/shared";

/**
 * Client for the data push endpoint.
 * Retries connection-level failures internally before giving up.
 */
export interface PushClient {
	/**
	 * POST the payload with basic auth.
	 * @throws PushTransportError when every transport-level try failed.
	 */
	push(body: Uint8Array): Promise<PushResponse>;
}
