import * as assert from "node:assert";
import { suite, test, beforeEach, afterEach } from "vitest";
import { getLogLevel, logMessage, resetLogLevelCache, setLogLevel, setLogOutput } from "../../utils/log.js";

suite("Log Utils Test Suite", () => {
	let stdout: string[];
	let stderr: string[];

	beforeEach(() => {
		stdout = [];
		stderr = [];
		setLogOutput({
			stdout: (line) => stdout.push(line),
			stderr: (line) => stderr.push(line),
		});
		resetLogLevelCache();
	});

	afterEach(() => {
		setLogOutput();
		resetLogLevelCache();
	});

	suite("logMessage", () => {
		test("should prefix the message with its level", () => {
			logMessage("Test message", "info");

			assert.deepStrictEqual(stdout, ["INFO: Test message\n"]);
		});

		test("should write errors to standard error", () => {
			logMessage("Error message", "error");

			assert.deepStrictEqual(stderr, ["ERROR: Error message\n"]);
			assert.strictEqual(stdout.length, 0);
		});

		test("should write warnings to standard output", () => {
			logMessage("Warning message", "warn");

			assert.deepStrictEqual(stdout, ["WARN: Warning message\n"]);
		});

		test("should not log message when type is above configured log level", () => {
			setLogLevel("error");

			logMessage("Debug message", "debug");
			logMessage("Info message", "info");

			assert.strictEqual(stdout.length, 0);
		});

		test("should use default log level 'info' when none is set", () => {
			assert.strictEqual(getLogLevel(), "info");

			logMessage("Debug message", "debug");
			logMessage("Info message");

			assert.deepStrictEqual(stdout, ["INFO: Info message\n"]);
		});

		test("should handle all log levels correctly", () => {
			setLogLevel("debug");

			logMessage("Error message", "error");
			logMessage("Warning message", "warn");
			logMessage("Info message", "info");
			logMessage("Debug message", "debug");

			assert.deepStrictEqual(stderr, ["ERROR: Error message\n"]);
			assert.deepStrictEqual(stdout, ["WARN: Warning message\n", "INFO: Info message\n", "DEBUG: Debug message\n"]);
		});
	});

	suite("resetLogLevelCache", () => {
		test("should restore the default level", () => {
			setLogLevel("debug");
			resetLogLevelCache();

			assert.strictEqual(getLogLevel(), "info");
		});
	});
});
