import { MetadataResponseError, MetadataUnreachableError } from "../errors/index.js";
import { formatError } from "../utils/index.js";

/**
 * Fetch a metadata document as text.
 * @throws MetadataUnreachableError when the request throws or times out.
 * @throws MetadataResponseError for a non-2xx status, carrying the body.
 */
export async function fetchMetadata(url: string, init: RequestInit, timeoutMs: number): Promise<string> {
	const controller = new AbortController();
	const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

	let status: number;
	let ok: boolean;
	let body: string;
	try {
		const response = await fetch(url, { ...init, signal: controller.signal });
		status = response.status;
		ok = response.ok;
		body = await response.text();
	} catch (err) {
		if (err instanceof Error && err.name === "AbortError") {
			throw new MetadataUnreachableError(url, "Request timeout");
		}
		throw new MetadataUnreachableError(url, formatError(err));
	} finally {
		clearTimeout(timeoutId);
	}

	if (!ok) {
		throw new MetadataResponseError(url, status, body);
	}
	return body;
}
