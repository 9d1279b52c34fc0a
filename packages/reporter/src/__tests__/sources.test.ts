/**
 * Tests for metadata sources
 *
 * Covers:
 * - AWS token handshake and identity document request
 * - Azure document request and pretty-printing
 * - Issue classification (unreachable, http-status, malformed, command-failed)
 * - Host identity command and its OS summary fallback
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import * as os from "node:os";
import { HOST_IDENTITY_TIMEOUT_MS } from "@instance-reporter/shared";
import {
	AwsMetadataSource,
	AzureMetadataSource,
	HostIdentitySource,
	type CommandRunner,
	describeHost,
	prettyPrintJson,
} from "../sources/index.js";
import {
	type FetchMockContext,
	captureFetchContext,
	createMockLogger,
	headersOf,
	textResponse,
} from "./test-utils.js";

const OPTIONS = { metadataServiceUrl: "http://metadata.test", requestTimeoutMs: 1000 };
const TOKEN_URL = "http://metadata.test/latest/api/token";
const DOCUMENT_URL = "http://metadata.test/latest/dynamic/instance-identity/document";
const AZURE_URL = "http://metadata.test/metadata/instance?api-version=2021-02-01";
const AWS_DOCUMENT = '{"instanceId":"i-0abc","region":"us-east-1"}';

describe("Metadata Sources", () => {
	let fetchContext: FetchMockContext;

	beforeEach(() => {
		fetchContext = captureFetchContext();
	});

	afterEach(() => {
		fetchContext.restore();
		vi.restoreAllMocks();
	});

	describe("AwsMetadataSource", () => {
		it("requests a token, then the document with that token", async () => {
			const fetchMock = vi.fn()
				.mockResolvedValueOnce(textResponse("tok-123\n"))
				.mockResolvedValueOnce(textResponse(AWS_DOCUMENT));
			global.fetch = fetchMock;

			const segment = await new AwsMetadataSource(OPTIONS, createMockLogger()).collect();

			expect(segment).toEqual({ text: `${AWS_DOCUMENT}\n`, issues: [] });
			expect(fetchMock).toHaveBeenCalledTimes(2);

			const [tokenUrl, tokenInit] = fetchMock.mock.calls[0] as [string, RequestInit];
			expect(tokenUrl).toBe(TOKEN_URL);
			expect(tokenInit.method).toBe("PUT");
			expect(headersOf(tokenInit)).toEqual({ "x-aws-ec2-metadata-token-ttl-seconds": "21600" });

			const [documentUrl, documentInit] = fetchMock.mock.calls[1] as [string, RequestInit];
			expect(documentUrl).toBe(DOCUMENT_URL);
			expect(documentInit.method).toBe("GET");
			expect(headersOf(documentInit)).toEqual({ "x-aws-ec2-metadata-token": "tok-123" });
		});

		it("forwards the document without re-formatting it", async () => {
			const document = '{\n  "instanceId" : "i-0abc"\n}';
			global.fetch = vi.fn()
				.mockResolvedValueOnce(textResponse("tok"))
				.mockResolvedValueOnce(textResponse(document));

			const segment = await new AwsMetadataSource(OPTIONS, createMockLogger()).collect();

			expect(segment.text).toBe(`${document}\n`);
		});

		it("collapses trailing newlines of the document", async () => {
			global.fetch = vi.fn()
				.mockResolvedValueOnce(textResponse("tok"))
				.mockResolvedValueOnce(textResponse(`${AWS_DOCUMENT}\n\n`));

			const segment = await new AwsMetadataSource(OPTIONS, createMockLogger()).collect();

			expect(segment.text).toBe(`${AWS_DOCUMENT}\n`);
		});

		it("requests the document without a token when the token request fails", async () => {
			const fetchMock = vi.fn()
				.mockRejectedValueOnce(new Error("connect EHOSTUNREACH"))
				.mockResolvedValueOnce(textResponse(AWS_DOCUMENT));
			global.fetch = fetchMock;

			const segment = await new AwsMetadataSource(OPTIONS, createMockLogger()).collect();

			expect(segment.text).toBe(`${AWS_DOCUMENT}\n`);
			expect(segment.issues).toEqual([{
				source: "aws",
				kind: "unreachable",
				detail: `Metadata service unreachable at ${TOKEN_URL}: connect EHOSTUNREACH`,
			}]);
			const [, documentInit] = fetchMock.mock.calls[1] as [string, RequestInit];
			expect(headersOf(documentInit)).toEqual({});
		});

		it("forwards an error body and records the status", async () => {
			global.fetch = vi.fn()
				.mockResolvedValueOnce(textResponse("tok"))
				.mockResolvedValueOnce(textResponse("Not Found", 404));

			const segment = await new AwsMetadataSource(OPTIONS, createMockLogger()).collect();

			expect(segment.text).toBe("Not Found\n");
			expect(segment.issues).toEqual([{
				source: "aws",
				kind: "http-status",
				detail: `Metadata service returned status 404 for ${DOCUMENT_URL}`,
			}]);
		});

		it("contributes an empty line when the service is unreachable", async () => {
			global.fetch = vi.fn().mockRejectedValue(new Error("connect ETIMEDOUT"));

			const segment = await new AwsMetadataSource(OPTIONS, createMockLogger()).collect();

			expect(segment.text).toBe("\n");
			expect(segment.issues.map(issue => issue.kind)).toEqual(["unreachable", "unreachable"]);
		});

		it("flags a document that is not JSON", async () => {
			global.fetch = vi.fn()
				.mockResolvedValueOnce(textResponse("tok"))
				.mockResolvedValueOnce(textResponse("<html>captive portal</html>"));

			const segment = await new AwsMetadataSource(OPTIONS, createMockLogger()).collect();

			expect(segment.text).toBe("<html>captive portal</html>\n");
			expect(segment.issues).toHaveLength(1);
			expect(segment.issues[0].source).toBe("aws");
			expect(segment.issues[0].kind).toBe("malformed");
			expect(segment.issues[0].detail).toContain(`Malformed metadata document from ${DOCUMENT_URL}`);
		});

		it("treats a timeout as unreachable", async () => {
			global.fetch = vi.fn().mockImplementation((_url: string, init: RequestInit) => {
				return new Promise((_resolve, reject) => {
					init.signal?.addEventListener("abort", () => {
						const err = new Error("This operation was aborted");
						err.name = "AbortError";
						reject(err);
					});
				});
			});

			const source = new AwsMetadataSource({ ...OPTIONS, requestTimeoutMs: 20 }, createMockLogger());
			const segment = await source.collect();

			expect(segment.issues[0]).toEqual({
				source: "aws",
				kind: "unreachable",
				detail: `Metadata service unreachable at ${TOKEN_URL}: Request timeout`,
			});
		});
	});

	describe("prettyPrintJson", () => {
		it("indents by four spaces", () => {
			expect(prettyPrintJson('{"a":{"b":1}}')).toBe('{\n    "a": {\n        "b": 1\n    }\n}');
		});

		it("keeps every digit of large integers", () => {
			expect(prettyPrintJson('{"n": 12345678901234567890, "f": 1.50}')).toBe('{\n    "n": 12345678901234567890,\n    "f": 1.50\n}');
		});

		it("keeps key order", () => {
			expect(prettyPrintJson('{"b": 1, "10": 2}')).toBe('{\n    "b": 1,\n    "10": 2\n}');
		});

		it("keeps empty containers on one line", () => {
			expect(prettyPrintJson('{"a":[],"b":{ }}')).toBe('{\n    "a": [],\n    "b": {}\n}');
		});

		it("indents nested arrays", () => {
			expect(prettyPrintJson("[1,[2,3]]")).toBe("[\n    1,\n    [\n        2,\n        3\n    ]\n]");
		});

		it("copies strings verbatim", () => {
			const text = String.raw`["a, b", "{\"x\": [1]}", "tab\tend"]`;
			const expected = String.raw`[
    "a, b",
    "{\"x\": [1]}",
    "tab\tend"
]`;
			expect(prettyPrintJson(text)).toBe(expected);
		});

		it("re-indents an already formatted document", () => {
			expect(prettyPrintJson('{\r\n  "a" : 1\r\n}\n')).toBe('{\n    "a": 1\n}');
		});

		it("returns null for invalid JSON", () => {
			expect(prettyPrintJson("")).toBeNull();
			expect(prettyPrintJson("{broken")).toBeNull();
		});
	});

	describe("AzureMetadataSource", () => {
		it("requests the instance document with the Metadata header", async () => {
			const fetchMock = vi.fn().mockResolvedValue(textResponse('{"compute":{"vmId":"vm-1"}}'));
			global.fetch = fetchMock;

			const segment = await new AzureMetadataSource(OPTIONS, createMockLogger()).collect();

			const [url, init] = fetchMock.mock.calls[0] as [string, RequestInit];
			expect(url).toBe(AZURE_URL);
			expect(init.method).toBe("GET");
			expect(headersOf(init)).toEqual({ metadata: "true" });
			expect(segment).toEqual({
				text: '{\n    "compute": {\n        "vmId": "vm-1"\n    }\n}\n',
				issues: [],
			});
		});

		it("contributes an empty line for a document that does not parse", async () => {
			global.fetch = vi.fn().mockResolvedValue(textResponse("not json"));

			const segment = await new AzureMetadataSource(OPTIONS, createMockLogger()).collect();

			expect(segment.text).toBe("\n");
			expect(segment.issues).toEqual([{
				source: "azure",
				kind: "malformed",
				detail: `Malformed metadata document from ${AZURE_URL}: document is not valid JSON`,
			}]);
		});

		it("pretty-prints a JSON error body and records the status", async () => {
			global.fetch = vi.fn().mockResolvedValue(textResponse('{"error":"Bad request"}', 400));

			const segment = await new AzureMetadataSource(OPTIONS, createMockLogger()).collect();

			expect(segment.text).toBe('{\n    "error": "Bad request"\n}\n');
			expect(segment.issues).toEqual([{
				source: "azure",
				kind: "http-status",
				detail: `Metadata service returned status 400 for ${AZURE_URL}`,
			}]);
		});

		it("records one issue when unreachable", async () => {
			global.fetch = vi.fn().mockRejectedValue(new Error("connect ENETUNREACH"));

			const segment = await new AzureMetadataSource(OPTIONS, createMockLogger()).collect();

			expect(segment.text).toBe("\n");
			expect(segment.issues).toEqual([{
				source: "azure",
				kind: "unreachable",
				detail: `Metadata service unreachable at ${AZURE_URL}: connect ENETUNREACH`,
			}]);
		});
	});

	describe("HostIdentitySource", () => {
		it("uses the command output as-is", async () => {
			const output = "   Static hostname: node-1\n  Operating System: Ubuntu 22.04.4 LTS\n";
			const run = vi.fn<CommandRunner>(() => Promise.resolve(output));

			const segment = await new HostIdentitySource(createMockLogger(), run).collect();

			expect(segment).toEqual({ text: output, issues: [] });
			expect(run).toHaveBeenCalledWith("hostnamectl", [], HOST_IDENTITY_TIMEOUT_MS);
		});

		it("falls back to the OS summary when the command fails", async () => {
			const run = vi.fn<CommandRunner>(() => Promise.reject(new Error("spawn hostnamectl ENOENT")));
			const logger = createMockLogger();

			const segment = await new HostIdentitySource(logger, run).collect();

			expect(segment.text).toBe(describeHost());
			expect(segment.issues).toEqual([{
				source: "host-identity",
				kind: "command-failed",
				detail: "hostnamectl failed: spawn hostnamectl ENOENT",
			}]);
			expect(logger.debug).toHaveBeenCalledWith("Falling back to OS summary: hostnamectl failed: spawn hostnamectl ENOENT");
		});
	});

	describe("describeHost", () => {
		it("lays out the host like hostnamectl", () => {
			const lines = describeHost().split("\n");

			expect(lines).toEqual([
				`     Static hostname: ${os.hostname()}`,
				`    Operating System: ${os.version()}`,
				`              Kernel: ${os.type()} ${os.release()}`,
				`        Architecture: ${os.arch()}`,
				"",
			]);
		});
	});
});
