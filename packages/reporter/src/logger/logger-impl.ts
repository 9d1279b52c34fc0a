import * as fs from "node:fs";
import * as path from "node:path";
import type { Logger } from "../types";
import { LogFileError } from "../errors";
import { formatError } from "../utils";
import { LOG_LEVELS, type LogLevel, getCurrentLevel } from "./log-level";

export interface LoggerOptions {
	/** Append-only file receiving every line printed to the console */
	logFile?: string;
}

function formatTimestamp(): string {
	return new Date().toISOString();
}

export class LoggerImpl implements Logger {
	constructor(
		private readonly prefix: string,
		private readonly options: LoggerOptions = {},
	) {}

	private log(level: LogLevel, message: string): void {
		if (LOG_LEVELS[level] >= LOG_LEVELS[getCurrentLevel()]) {
			const timestamp = formatTimestamp();
			const levelStr = level.toUpperCase().padEnd(5);
			const line = `[${timestamp}] [${levelStr}] [${this.prefix}] ${message}`;
			if (level === "error") {
				console.error(line);
			} else {
				console.log(line);
			}
			if (this.options.logFile) {
				this.append(this.options.logFile, line);
			}
		}
	}

	private append(logFile: string, line: string): void {
		try {
			fs.appendFileSync(logFile, `${line}\n`);
		} catch (err) {
			// The file was writable at startup; keep the console output going
			console.error(`[${formatTimestamp()}] [ERROR] [${this.prefix}] Log file write failed: ${formatError(err)}`);
		}
	}

	debug(message: string): void {
		this.log("debug", message);
	}

	info(message: string): void {
		this.log("info", message);
	}

	warn(message: string): void {
		this.log("warn", message);
	}

	error(message: string): void {
		this.log("error", message);
	}
}

/**
 * Make sure the log file can be appended to, creating its directory if needed.
 * @throws LogFileError when the file cannot be opened.
 */
export function ensureLogFile(logFile: string): void {
	try {
		fs.mkdirSync(path.dirname(logFile), { recursive: true });
		fs.appendFileSync(logFile, "");
	} catch (err) {
		throw new LogFileError(logFile, formatError(err));
	}
}
