import { describe, it, expect } from "vitest";
import {
	Tm2SnipError,
	SourceDirectoryError,
	TargetDirectoryError,
	ConfigError,
	isTm2SnipError,
	getErrorMessage,
	wrapError,
} from "../src/errors.js";

describe("Tm2SnipError", () => {
	it("creates error with message and code", () => {
		const error = new Tm2SnipError("Test message", "TEST_CODE");

		expect(error.message).toBe("Test message");
		expect(error.code).toBe("TEST_CODE");
		expect(error.name).toBe("Tm2SnipError");
		expect(error.suggestion).toBeUndefined();
	});

	it("creates error with suggestion", () => {
		const error = new Tm2SnipError("Test", "CODE", { suggestion: "Try this instead" });

		expect(error.suggestion).toBe("Try this instead");
	});

	it("formats error without suggestion", () => {
		const error = new Tm2SnipError("Test message", "CODE");

		expect(error.format()).toBe("Tm2SnipError [CODE]: Test message");
	});

	it("formats error with suggestion", () => {
		const error = new Tm2SnipError("Test message", "CODE", { suggestion: "Try this" });

		expect(error.format()).toBe("Tm2SnipError [CODE]: Test message\n  Suggestion: Try this");
	});

	it("preserves cause", () => {
		const cause = new Error("root");
		const error = new Tm2SnipError("Wrapped", "CODE", { cause });

		expect(error.cause).toBe(cause);
	});
});

describe("SourceDirectoryError", () => {
	it("creates error with correct name, code and directory", () => {
		const error = new SourceDirectoryError("Could not open", { directory: "/missing" });

		expect(error.name).toBe("SourceDirectoryError");
		expect(error.code).toBe("SOURCE_DIR_ERROR");
		expect(error.directory).toBe("/missing");
		expect(error.suggestion).toBe("Check that '/missing' exists and is readable");
		expect(error instanceof Tm2SnipError).toBe(true);
	});
});

describe("TargetDirectoryError", () => {
	it("creates error with correct name, code and directory", () => {
		const error = new TargetDirectoryError("Not writable", { directory: "/out" });

		expect(error.name).toBe("TargetDirectoryError");
		expect(error.code).toBe("TARGET_DIR_ERROR");
		expect(error.directory).toBe("/out");
		expect(error.suggestion).toBe("Create '/out' and make sure it is writable");
	});
});

describe("ConfigError", () => {
	it("sets suggestion from the configuration path", () => {
		const error = new ConfigError("bad value", { configPath: "/a/.tm2snip.yml" });

		expect(error.code).toBe("CONFIG_ERROR");
		expect(error.configPath).toBe("/a/.tm2snip.yml");
		expect(error.suggestion).toBe("Check the configuration file at: /a/.tm2snip.yml");
	});

	it("leaves suggestion undefined without a path", () => {
		const error = new ConfigError("bad value");

		expect(error.suggestion).toBeUndefined();
	});
});

describe("isTm2SnipError", () => {
	it("returns true for Tm2SnipError subclasses", () => {
		expect(isTm2SnipError(new ConfigError("x"))).toBe(true);
	});

	it("returns false for plain errors and other values", () => {
		expect(isTm2SnipError(new Error("x"))).toBe(false);
		expect(isTm2SnipError("x")).toBe(false);
	});
});

describe("getErrorMessage", () => {
	it("returns the message of an Error", () => {
		expect(getErrorMessage(new Error("boom"))).toBe("boom");
	});

	it("stringifies other values", () => {
		expect(getErrorMessage(42)).toBe("42");
	});
});

describe("wrapError", () => {
	it("returns Tm2SnipError unchanged", () => {
		const original = new ConfigError("Original");

		expect(wrapError(original)).toBe(original);
	});

	it("wraps a regular Error with context", () => {
		const wrapped = wrapError(new Error("Regular error"), "Converting");

		expect(wrapped.message).toBe("Converting: Regular error");
		expect(wrapped.code).toBe("UNKNOWN_ERROR");
	});

	it("formats a wrapped error with the unknown error code", () => {
		expect(wrapError(new Error("disk full"), "Conversion failed").format()).toBe(
			"Tm2SnipError [UNKNOWN_ERROR]: Conversion failed: disk full",
		);
	});

	it("wraps a string", () => {
		expect(wrapError("String error").message).toBe("String error");
	});
});
