import * as fs from "node:fs";
import * as path from "node:path";

/**
 * Writes a `.tmSnippet` file built from ordered key/value pairs.
 */
export function writeTmSnippet(directory: string, fileName: string, pairs: Array<[string, string]>): void {
	const body = pairs.map(([key, value]) => `<key>${key}</key><string>${value}</string>`).join("\n");
	fs.writeFileSync(
		path.join(directory, fileName),
		`<?xml version="1.0" encoding="UTF-8"?>\n<plist version="1.0">\n<dict>\n${body}\n</dict>\n</plist>\n`,
	);
}

/**
 * Captured output of a run.
 */
export interface CapturedOutput {
	stdout: string[];
	stderr: string[];
}

/**
 * Creates empty output buffers and writers appending to them.
 */
export function captureOutput(): CapturedOutput & {
	writers: { stdout: (text: string) => void; stderr: (text: string) => void };
} {
	const stdout: string[] = [];
	const stderr: string[] = [];
	return {
		stdout,
		stderr,
		writers: {
			stdout: (text) => stdout.push(text),
			stderr: (text) => stderr.push(text),
		},
	};
}
