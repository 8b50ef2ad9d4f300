import { LOG_LEVELS, type LogLevel } from "@tm2snip/core";
import { DEFAULT_LOG_LEVEL } from "../constants.js";

export type { LogLevel };

/**
 * Destination for formatted log lines.
 */
export interface LogOutput {
	/** Receives lines for "warn", "info" and "debug". */
	stdout: (line: string) => void;
	/** Receives lines for "error". */
	stderr: (line: string) => void;
}

const processOutput: LogOutput = {
	stdout: (line) => process.stdout.write(line),
	stderr: (line) => process.stderr.write(line),
};

let output: LogOutput = processOutput;
let cachedLogLevel: LogLevel | undefined;

/**
 * Set the active log level.
 */
export function setLogLevel(level: LogLevel): void {
	cachedLogLevel = level;
}

/**
 * Get the active log level, falling back to the default.
 */
export function getLogLevel(): LogLevel {
	return cachedLogLevel ?? DEFAULT_LOG_LEVEL;
}

/**
 * Forget the active log level so the default applies again.
 */
export function resetLogLevelCache(): void {
	cachedLogLevel = undefined;
}

/**
 * Redirect log output, or restore process output when called without arguments.
 */
export function setLogOutput(next: LogOutput = processOutput): void {
	output = next;
}

/**
 * Logs a message if its type is at or below the active log level.
 * Lines are written as "<LEVEL>: <message>"; errors go to standard error.
 *
 * @param {string} message - The message to log.
 * @param {LogLevel} [type="info"] - The type of log message.
 */
export function logMessage(message: string, type: LogLevel = "info"): void {
	if (LOG_LEVELS.indexOf(type) > LOG_LEVELS.indexOf(getLogLevel())) {
		return;
	}

	const line = `${type.toUpperCase()}: ${message}\n`;
	if (type === "error") {
		output.stderr(line);
	} else {
		output.stdout(line);
	}
}
