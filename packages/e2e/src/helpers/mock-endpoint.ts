/**
 * Mock Endpoint Server for E2E Tests
 *
 * One in-process HTTP server playing both the cloud metadata service
 * (AWS IMDSv2 and Azure routes) and the data push endpoint.
 * Records every request and answers pushes from a script.
 */

import * as http from "node:http";
import { AWS_METADATA, AZURE_METADATA } from "@instance-reporter/shared";
import { AWS_DOCUMENT, AWS_TOKEN, AZURE_DOCUMENT, PUSH_OK_BODY } from "./constants.js";

export interface RecordedRequest {
	method: string;
	/** Path and query string */
	url: string;
	headers: http.IncomingHttpHeaders;
	body: string;
}

export interface PushReply {
	status: number;
	body: string;
}

export interface MockEndpointConfig {
	/** Status for every metadata route (default 200) */
	metadataStatus?: number;
	awsDocument?: string;
	azureDocument?: string;
	/** Replies to push requests in order; the last one repeats */
	pushReplies?: PushReply[];
	/** Reset the connection of this many push requests before replying */
	dropPushConnections?: number;
}

export interface MockEndpointServer {
	url: string;
	port: number;
	readonly requests: RecordedRequest[];
	pushRequests(): RecordedRequest[];
	metadataRequests(): RecordedRequest[];
	setConfig(config: MockEndpointConfig): void;
	close(): Promise<void>;
}

const AZURE_ROUTE = `${AZURE_METADATA.INSTANCE_PATH}?api-version=${AZURE_METADATA.API_VERSION}`;

function isPushRequest(request: RecordedRequest): boolean {
	return request.method === "POST" && request.url.startsWith("/data/");
}

/**
 * Create the mock endpoint on an ephemeral port
 */
export async function createMockEndpoint(
	initialConfig: MockEndpointConfig = {},
): Promise<MockEndpointServer> {
	let config: MockEndpointConfig = { ...initialConfig };
	const requests: RecordedRequest[] = [];
	let pushCount = 0;
	let dropped = 0;

	const reply = (res: http.ServerResponse, status: number, body: string): void => {
		res.writeHead(status, { "Content-Type": "application/json" });
		res.end(body);
	};

	const handle = (req: http.IncomingMessage, res: http.ServerResponse, request: RecordedRequest): void => {
		const metadataStatus = config.metadataStatus ?? 200;

		if (request.method === "PUT" && request.url === AWS_METADATA.TOKEN_PATH) {
			reply(res, metadataStatus, AWS_TOKEN);
			return;
		}

		if (request.method === "GET" && request.url === AWS_METADATA.IDENTITY_DOCUMENT_PATH) {
			// IMDSv2 only: the document needs the session token
			if (req.headers[AWS_METADATA.TOKEN_HEADER.toLowerCase()] !== AWS_TOKEN) {
				reply(res, 401, "");
				return;
			}
			reply(res, metadataStatus, config.awsDocument ?? AWS_DOCUMENT);
			return;
		}

		if (request.method === "GET" && request.url === AZURE_ROUTE) {
			if (req.headers[AZURE_METADATA.REQUIRED_HEADER.toLowerCase()] !== "true") {
				reply(res, 400, '{"error":"Bad request. Required metadata header not specified"}');
				return;
			}
			reply(res, metadataStatus, config.azureDocument ?? AZURE_DOCUMENT);
			return;
		}

		if (isPushRequest(request)) {
			if (dropped < (config.dropPushConnections ?? 0)) {
				dropped++;
				req.socket.destroy();
				return;
			}
			const replies = config.pushReplies ?? [{ status: 200, body: PUSH_OK_BODY }];
			const next = replies[Math.min(pushCount, replies.length - 1)];
			pushCount++;
			reply(res, next.status, next.body);
			return;
		}

		reply(res, 404, '{"error":"not found"}');
	};

	const server = http.createServer((req, res) => {
		const chunks: Buffer[] = [];
		req.on("data", (chunk: Buffer) => chunks.push(chunk));
		req.on("end", () => {
			const request: RecordedRequest = {
				method: req.method ?? "",
				url: req.url ?? "",
				headers: req.headers,
				body: Buffer.concat(chunks).toString("utf-8"),
			};
			requests.push(request);
			handle(req, res, request);
		});
	});

	await new Promise<void>((resolve) => {
		server.listen(0, "127.0.0.1", () => resolve());
	});

	const address = server.address();
	if (!address || typeof address === "string") {
		throw new Error("Failed to get server address");
	}

	const port = address.port;

	return {
		url: `http://127.0.0.1:${port}`,
		port,
		requests,
		pushRequests: () => requests.filter(isPushRequest),
		metadataRequests: () => requests.filter(request => !isPushRequest(request)),
		setConfig: (newConfig: MockEndpointConfig) => {
			config = { ...newConfig };
			pushCount = 0;
			dropped = 0;
		},
		close: async () => {
			server.closeAllConnections();
			await new Promise<void>((resolve, reject) => {
				server.close((err) => {
					if (err) reject(err);
					else resolve();
				});
			});
		},
	};
}
