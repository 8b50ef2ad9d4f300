/**
 * @title Errors
 * @description Error types for @tm2snip/core.
 *
 * Provides typed error classes for the directory-level and configuration
 * failures that abort a conversion run.
 *
 * @module errors
 */

/**
 * Options for constructing a Tm2SnipError.
 */
export interface Tm2SnipErrorOptions {
	/** Suggestion for how to resolve the error. */
	suggestion?: string;
	/** Original error that caused this error. */
	cause?: unknown;
}

/**
 * Base error class for all tm2snip errors.
 */
export class Tm2SnipError extends Error {
	/** Error code for programmatic handling. */
	readonly code: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(message: string, code: string, options?: Tm2SnipErrorOptions) {
		super(message, { cause: options?.cause });
		this.name = "Tm2SnipError";
		this.code = code;
		this.suggestion = options?.suggestion;

		// Maintain proper stack trace in V8 environments
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display, tagged with its code.
	 */
	format(): string {
		let result = `${this.name} [${this.code}]: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}

/**
 * Error when the snippet source directory cannot be listed.
 */
export class SourceDirectoryError extends Tm2SnipError {
	/** The directory that could not be listed. */
	readonly directory: string;

	constructor(message: string, options: { directory: string; cause?: unknown }) {
		super(message, "SOURCE_DIR_ERROR", {
			suggestion: `Check that '${options.directory}' exists and is readable`,
			cause: options.cause,
		});
		this.name = "SourceDirectoryError";
		this.directory = options.directory;
	}
}

/**
 * Error when the output directory is missing or cannot be written to.
 */
export class TargetDirectoryError extends Tm2SnipError {
	/** The directory that was rejected. */
	readonly directory: string;

	constructor(message: string, options: { directory: string; cause?: unknown }) {
		super(message, "TARGET_DIR_ERROR", {
			suggestion: `Create '${options.directory}' and make sure it is writable`,
			cause: options.cause,
		});
		this.name = "TargetDirectoryError";
		this.directory = options.directory;
	}
}

/**
 * Error when a configuration file cannot be read or holds invalid values.
 */
export class ConfigError extends Tm2SnipError {
	/** Path to the configuration file. */
	readonly configPath?: string;

	constructor(message: string, options?: { configPath?: string; cause?: unknown }) {
		super(message, "CONFIG_ERROR", {
			suggestion: options?.configPath ? `Check the configuration file at: ${options.configPath}` : undefined,
			cause: options?.cause,
		});
		this.name = "ConfigError";
		this.configPath = options?.configPath;
	}
}

/**
 * Check if an error is a Tm2SnipError.
 */
export function isTm2SnipError(error: unknown): error is Tm2SnipError {
	return error instanceof Tm2SnipError;
}

/**
 * Extract a human-readable message from an unknown error value.
 */
export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap an unknown error as a Tm2SnipError.
 */
export function wrapError(error: unknown, context?: string): Tm2SnipError {
	if (isTm2SnipError(error)) {
		return error;
	}

	const contextPrefix = context ? `${context}: ` : "";

	return new Tm2SnipError(`${contextPrefix}${getErrorMessage(error)}`, "UNKNOWN_ERROR", { cause: error });
}
