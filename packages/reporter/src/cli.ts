/**
 * CLI entry point for the reporter.
 * Meant for a scheduled job, e.g.
 *   10 0 * * * npm --prefix /opt/instance-data-reporter start -- -c /p4/common/config/.push_metrics.cfg
 */

import { runReporter } from "./run.js";

/**
 * Check if this module is being run directly (as CLI entry point).
 */
function isMainModule(): boolean {
	const scriptPath = process.argv[1];
	if (!scriptPath) {
		return false;
	}
	// Works for both .js (compiled) and .ts (tsx) execution
	return scriptPath.includes("packages/reporter") && (
		scriptPath.endsWith("cli.js") ||
		scriptPath.endsWith("cli.ts")
	);
}

if (isMainModule()) {
	runReporter(process.argv.slice(2))
		.then((code) => process.exit(code))
		.catch((err: unknown) => {
			console.error("Reporter failed:", err);
			process.exit(1);
		});
}
