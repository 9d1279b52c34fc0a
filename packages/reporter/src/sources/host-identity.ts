import { execFile } from "node:child_process";
import * as os from "node:os";
import { HOST_IDENTITY_TIMEOUT_MS, METADATA_ISSUE_KIND, type MetadataIssue } from "@instance-reporter/shared";
import type { Logger, MetadataSegment, MetadataSource } from "../types/index.js";
import { LoggerImpl } from "../logger/index.js";
import { formatError } from "../utils/index.js";

/**
 * Runs a command and resolves with its stdout followed by its stderr.
 * Rejects when the command cannot be started, times out, or exits non-zero.
 */
export type CommandRunner = (command: string, args: string[], timeoutMs: number) => Promise<string>;

export const runCommand: CommandRunner = (command, args, timeoutMs) => {
	return new Promise((resolve, reject) => {
		execFile(command, args, { timeout: timeoutMs, encoding: "utf-8" }, (err, stdout, stderr) => {
			if (err) {
				reject(err);
				return;
			}
			resolve(stdout + stderr);
		});
	});
};

/**
 * OS summary laid out like hostnamectl, used when that command is unavailable.
 */
export function describeHost(): string {
	return [
		`     Static hostname: ${os.hostname()}`,
		`    Operating System: ${os.version()}`,
		`              Kernel: ${os.type()} ${os.release()}`,
		`        Architecture: ${os.arch()}`,
		"",
	].join("\n");
}

/**
 * Source for the host identity segment, always first in the payload.
 */
export class HostIdentitySource implements MetadataSource {
	static readonly COMMAND = "hostnamectl";

	private readonly logger: Logger;

	constructor(
		logger?: Logger,
		private readonly run: CommandRunner = runCommand,
	) {
		this.logger = logger ?? new LoggerImpl("host-identity");
	}

	async collect(): Promise<MetadataSegment> {
		try {
			const text = await this.run(HostIdentitySource.COMMAND, [], HOST_IDENTITY_TIMEOUT_MS);
			return { text, issues: [] };
		} catch (err) {
			const issue: MetadataIssue = {
				source: "host-identity",
				kind: METADATA_ISSUE_KIND.COMMAND_FAILED,
				detail: `${HostIdentitySource.COMMAND} failed: ${formatError(err)}`,
			};
			this.logger.debug(`Falling back to OS summary: ${issue.detail}`);
			return { text: describeHost(), issues: [issue] };
		}
	}
}
