/**
 * E2E: Push Retry
 *
 * The push endpoint answers with the transient credentials failure for a
 * while, or drops connections; the reporter retries as configured.
 */

import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { KNOWN_TRANSIENT_AUTH_FAILURE_BODY } from "@instance-reporter/shared";
import { PUSH_OK_BODY, createTestFixture } from "../helpers/index.js";

const TRANSIENT = { status: 401, body: KNOWN_TRANSIENT_AUTH_FAILURE_BODY };
const OK = { status: 200, body: PUSH_OK_BODY };

describe("E2E: Push Retry", () => {
	const fixture = createTestFixture("push-retry");

	beforeAll(() => fixture.setup());
	afterAll(() => fixture.teardown());
	beforeEach(async () => fixture.setupTest());
	afterEach(async () => fixture.teardownTest());

	it("retries the transient failure until it clears", async () => {
		fixture.endpoint.setConfig({ pushReplies: [TRANSIENT, TRANSIENT, OK] });

		const code = await fixture.run(["-none"]);

		expect(code).toBe(0);
		expect(fixture.endpoint.pushRequests()).toHaveLength(3);

		const lines = fixture.readLogLines();
		expect(lines.filter(line => line.includes("Retrying due to temporary password failure"))).toHaveLength(2);
		expect(lines.filter(line => line.includes("Pushing metrics"))).toHaveLength(3);
	});

	it("sends the same payload on every attempt", async () => {
		fixture.endpoint.setConfig({ pushReplies: [TRANSIENT, OK] });

		await fixture.run(["-aws"]);

		const [first, second] = fixture.endpoint.pushRequests();
		expect(second.body).toBe(first.body);
	});

	it("gives up after 10 attempts and exits 1", async () => {
		fixture.endpoint.setConfig({ pushReplies: [TRANSIENT] });

		const code = await fixture.run(["-none"]);

		expect(code).toBe(1);
		expect(fixture.endpoint.pushRequests()).toHaveLength(10);
		expect(fixture.readLogLines().some(line => line.endsWith("[push] Push loop iterations exceeded"))).toBe(true);
	});

	it("honours PUSH_MAX_ATTEMPTS", async () => {
		process.env.PUSH_MAX_ATTEMPTS = "3";
		fixture.endpoint.setConfig({ pushReplies: [TRANSIENT] });

		const code = await fixture.run(["-none"]);

		expect(code).toBe(1);
		expect(fixture.endpoint.pushRequests()).toHaveLength(3);
	});

	it("accepts any other response as delivered", async () => {
		fixture.endpoint.setConfig({ pushReplies: [{ status: 403, body: '{"message":"forbidden"}' }] });

		const code = await fixture.run(["-none"]);

		expect(code).toBe(0);
		expect(fixture.endpoint.pushRequests()).toHaveLength(1);
	});

	it("retries dropped connections within one attempt", async () => {
		fixture.endpoint.setConfig({ dropPushConnections: 2 });

		const code = await fixture.run(["-none"]);

		expect(code).toBe(0);
		expect(fixture.endpoint.pushRequests()).toHaveLength(3);
		const lines = fixture.readLogLines();
		expect(lines.filter(line => line.includes("Pushing metrics"))).toHaveLength(1);
		expect(lines.filter(line => line.includes("[push-client] Push request failed"))).toHaveLength(2);
	});

	it("ends after one attempt when the endpoint never answers", async () => {
		fixture.endpoint.setConfig({ dropPushConnections: 1000 });

		const code = await fixture.run(["-none"]);

		expect(code).toBe(0);
		expect(fixture.endpoint.pushRequests()).toHaveLength(6);
		const lines = fixture.readLogLines();
		expect(lines.filter(line => line.includes("Pushing metrics"))).toHaveLength(1);
		expect(lines.filter(line => line.includes("[push] Push request failed after 6 tries:"))).toHaveLength(1);
	});
});
