/**
 * E2E Test Fixture
 *
 * Encapsulates the setup shared by the reporter scenarios: a temp directory,
 * a config file pointing at the mock endpoint, and the environment the
 * reporter reads.
 *
 * Usage:
 *   const fixture = createTestFixture("report-flow");
 *
 *   beforeAll(() => fixture.setup());
 *   afterAll(() => fixture.teardown());
 *   beforeEach(async () => fixture.setupTest());
 *   afterEach(async () => fixture.teardownTest());
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { type MetadataSource, TOKENS, runReporter } from "@instance-reporter/reporter";
import { REPORTER_PATHS } from "@instance-reporter/shared";
import {
	E2E_CUSTOMER,
	E2E_INSTANCE,
	E2E_PASSWORD,
	E2E_USER,
	HOST_IDENTITY_TEXT,
} from "./constants.js";
import { type MockEndpointServer, createMockEndpoint } from "./mock-endpoint.js";

/**
 * Test fixture state and methods for managing E2E test lifecycle
 */
export interface TestFixture {
	/** The temporary directory for this test suite */
	readonly tempDir: string;

	/** The mock metadata service and push endpoint (throws before setupTest) */
	readonly endpoint: MockEndpointServer;

	/** The current test's log file */
	readonly logFile: string;

	/** The current test's metrics root */
	readonly metricsRoot: string;

	setup(): void;
	teardown(): void;

	/**
	 * Setup a single test (call in beforeEach).
	 * Starts the mock endpoint and writes a config file for it.
	 */
	setupTest(): Promise<void>;

	/**
	 * Teardown a single test (call in afterEach).
	 * Stops the endpoint and restores the environment.
	 */
	teardownTest(): Promise<void>;

	/**
	 * Run the reporter against the mock endpoint.
	 * `-c` and `-m` are supplied; pass platform flags in `args`.
	 * @returns the exit code
	 */
	run(args?: string[]): Promise<number>;

	/** Lines of the current test's log file */
	readLogLines(): string[];

	/** Contents of the instance data file left by the run */
	readInstanceData(): string;
}

const REPORTER_ENV_KEYS = [
	"INSTANCE_METADATA_URL",
	"PUSH_MAX_ATTEMPTS",
	"PUSH_RETRY_DELAY_MS",
	"PUSH_TRANSPORT_RETRIES",
	"PUSH_TRANSPORT_RETRY_DELAY_MS",
	"HTTP_REQUEST_TIMEOUT_MS",
] as const;

const hostIdentityStub: MetadataSource = {
	collect: () => Promise.resolve({ text: HOST_IDENTITY_TEXT, issues: [] }),
};

/**
 * Creates a test fixture for E2E tests.
 *
 * @param prefix - Prefix for the temp directory name (e.g., "report-flow")
 */
export function createTestFixture(prefix: string): TestFixture {
	let tempDir = "";
	let testDir = "";
	let endpoint: MockEndpointServer | null = null;
	let savedEnv: Partial<Record<(typeof REPORTER_ENV_KEYS)[number], string>> = {};
	let testCount = 0;

	const requireTestDir = (): string => {
		if (!testDir) {
			throw new Error("Fixture test not set up. Call setupTest() first.");
		}
		return testDir;
	};

	const setup = (): void => {
		tempDir = fs.mkdtempSync(path.join(os.tmpdir(), `e2e-${prefix}-`));
	};

	const teardown = (): void => {
		if (tempDir) {
			fs.rmSync(tempDir, { recursive: true, force: true });
			tempDir = "";
		}
	};

	const setupTest = async (): Promise<void> => {
		if (!tempDir) {
			throw new Error("Fixture not set up. Call setup() first.");
		}
		testDir = path.join(tempDir, `test-${++testCount}`);
		fs.mkdirSync(testDir, { recursive: true });

		endpoint = await createMockEndpoint();

		const logFile = path.join(testDir, "logs", "report_instance_data.log");
		fs.writeFileSync(path.join(testDir, ".push_metrics.cfg"), [
			"# e2e push settings",
			`metrics_host=${endpoint.url}`,
			`metrics_customer=${E2E_CUSTOMER}`,
			`metrics_instance=${E2E_INSTANCE}`,
			`metrics_user=${E2E_USER}`,
			`metrics_passwd=${E2E_PASSWORD}`,
			`metadata_logfile=${logFile}`,
			"",
		].join("\n"));

		savedEnv = {};
		for (const key of REPORTER_ENV_KEYS) {
			savedEnv[key] = process.env[key];
			delete process.env[key];
		}
		process.env.INSTANCE_METADATA_URL = endpoint.url;
		process.env.PUSH_RETRY_DELAY_MS = "0";
		process.env.PUSH_TRANSPORT_RETRY_DELAY_MS = "0";
		process.env.HTTP_REQUEST_TIMEOUT_MS = "5000";
	};

	const teardownTest = async (): Promise<void> => {
		for (const key of REPORTER_ENV_KEYS) {
			const value = savedEnv[key];
			if (value === undefined) {
				delete process.env[key];
			} else {
				process.env[key] = value;
			}
		}

		if (endpoint) {
			await endpoint.close();
			endpoint = null;
		}
		testDir = "";
	};

	const run = (args: string[] = []): Promise<number> => {
		const dir = requireTestDir();
		return runReporter(
			["-c", path.join(dir, ".push_metrics.cfg"), "-m", path.join(dir, "metrics"), ...args],
			{ configure: (container) => container.override(TOKENS.HOST_IDENTITY_SOURCE, hostIdentityStub) },
		);
	};

	return {
		get tempDir() {
			return tempDir;
		},
		get endpoint() {
			if (!endpoint) {
				throw new Error("Fixture test not set up. Call setupTest() first.");
			}
			return endpoint;
		},
		get logFile() {
			return path.join(requireTestDir(), "logs", "report_instance_data.log");
		},
		get metricsRoot() {
			return path.join(requireTestDir(), "metrics");
		},
		setup,
		teardown,
		setupTest,
		teardownTest,
		run,
		readLogLines: () => fs.readFileSync(path.join(requireTestDir(), "logs", "report_instance_data.log"), "utf-8")
			.split("\n")
			.filter(line => line.length > 0),
		readInstanceData: () => fs.readFileSync(
			path.join(requireTestDir(), "metrics", REPORTER_PATHS.INSTANCE_DATA_FILENAME),
			"utf-8",
		),
	};
}
