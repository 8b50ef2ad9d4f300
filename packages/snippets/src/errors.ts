/**
 * @title Errors
 * @description Error types for @tm2snip/snippets.
 *
 * @module errors
 */

/**
 * Why a snippet file was rejected.
 *
 * - `unreadable`: the file could not be read.
 * - `invalid-source`: the file is not well-formed XML.
 * - `invalid-information`: no `<key>` or no `<string>` elements.
 * - `missing-information`: `<key>` and `<string>` counts differ.
 * - `missing-field`: a required key is absent.
 */
export type SnippetRejectionReason =
	| "unreadable"
	| "invalid-source"
	| "invalid-information"
	| "missing-information"
	| "missing-field";

/**
 * Error when parsing a snippet file fails.
 */
export class SnippetError extends Error {
	/** Error code for programmatic handling. */
	readonly code = "SNIPPET_ERROR";
	/** Why the snippet was rejected. */
	readonly reason: SnippetRejectionReason;
	/** Path to the snippet file. */
	readonly snippetPath?: string;
	/** Suggestion for how to resolve the error. */
	readonly suggestion?: string;

	constructor(
		message: string,
		options: { reason: SnippetRejectionReason; snippetPath?: string; cause?: unknown },
	) {
		super(message, { cause: options.cause });
		this.name = "SnippetError";
		this.reason = options.reason;
		this.snippetPath = options.snippetPath;
		this.suggestion = options.snippetPath ? `Check the snippet file at: ${options.snippetPath}` : undefined;

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Format the error for display.
	 */
	format(): string {
		let result = `${this.name} [${this.code}]: ${this.message}`;
		if (this.suggestion) {
			result += `\n  Suggestion: ${this.suggestion}`;
		}
		return result;
	}
}
