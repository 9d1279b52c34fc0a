import { describe, expect, it } from "vitest";
import {
	AWS_METADATA,
	AZURE_METADATA,
	HTTP_REQUEST_TIMEOUT_MS,
	KNOWN_TRANSIENT_AUTH_FAILURE_BODY,
	MAX_PUSH_ATTEMPTS,
	METADATA_SERVICE_URL,
	PUSH_DEFAULTS,
	PUSH_PORTS,
	PUSH_RETRY_DELAY_MS,
	REPORTER_PATHS,
} from "../constants.js";

describe("shared constants", () => {
	describe("push defaults", () => {
		it("MAX_PUSH_ATTEMPTS equals 10", () => {
			expect(MAX_PUSH_ATTEMPTS).toBe(10);
		});

		it("PUSH_RETRY_DELAY_MS equals 1000 milliseconds", () => {
			expect(PUSH_RETRY_DELAY_MS).toBe(1000);
		});

		it("transport retries 5 times", () => {
			expect(PUSH_DEFAULTS.TRANSPORT_RETRIES).toBe(5);
		});

		it("grouped values match individual exports", () => {
			expect(PUSH_DEFAULTS.MAX_ATTEMPTS).toBe(MAX_PUSH_ATTEMPTS);
			expect(PUSH_DEFAULTS.RETRY_DELAY_MS).toBe(PUSH_RETRY_DELAY_MS);
			expect(PUSH_DEFAULTS.REQUEST_TIMEOUT_MS).toBe(HTTP_REQUEST_TIMEOUT_MS);
		});
	});

	describe("metadata endpoints", () => {
		it("uses the link-local metadata address", () => {
			expect(METADATA_SERVICE_URL).toBe("http://169.254.169.254");
		});

		it("requests a 6 hour AWS token", () => {
			expect(AWS_METADATA.TOKEN_TTL_SECONDS).toBe(21600);
			expect(AWS_METADATA.TOKEN_PATH).toBe("/latest/api/token");
			expect(AWS_METADATA.IDENTITY_DOCUMENT_PATH).toBe("/latest/dynamic/instance-identity/document");
		});

		it("pins the Azure API version", () => {
			expect(AZURE_METADATA.API_VERSION).toBe("2021-02-01");
			expect(AZURE_METADATA.INSTANCE_PATH).toBe("/metadata/instance");
		});
	});

	describe("push endpoint", () => {
		it("maps the pushgateway port to the data push port", () => {
			expect(PUSH_PORTS.PUSHGATEWAY_SUFFIX).toBe("9091");
			expect(PUSH_PORTS.DATA_PUSH_SUFFIX).toBe("9092");
		});

		it("matches the exact transient failure body", () => {
			expect(KNOWN_TRANSIENT_AUTH_FAILURE_BODY).toBe('{"message":"invalid username or password"}');
		});
	});

	describe("reporter paths", () => {
		it("names the transient payload file", () => {
			expect(REPORTER_PATHS.INSTANCE_DATA_FILENAME).toBe("_instance_data.log");
		});
	});
});
