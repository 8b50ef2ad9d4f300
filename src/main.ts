#!/usr/bin/env node
import * as path from "node:path";
import { wrapError } from "@tm2snip/core";
import { runCli } from "./cli.js";
import { PROGRAM_NAME } from "./constants.js";
import { logMessage } from "./utils/log.js";

try {
	process.exitCode = runCli(process.argv.slice(2), {
		stdout: (text) => process.stdout.write(text),
		stderr: (text) => process.stderr.write(text),
		cwd: process.cwd(),
		programName: process.argv[1] ? path.basename(process.argv[1]) : PROGRAM_NAME,
	});
} catch (error) {
	logMessage(wrapError(error, "Conversion failed").format(), "error");
	process.exitCode = 1;
}
