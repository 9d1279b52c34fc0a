/**
 * Raw response of one push request.
 */
export interface PushResponse {
	status: number;
	body: string;
}

/**
 * Record of a single attempt of the push loop. Not persisted.
 */
export interface PushAttempt {
	/** 1-based attempt number */
	attempt: number;
	/** HTTP status, or null when the transport gave up */
	status: number | null;
	/** Raw response body, empty when the transport gave up */
	body: string;
	success: boolean;
}
