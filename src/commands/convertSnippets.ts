import { SourceDirectoryError, TargetDirectoryError, getErrorMessage } from "@tm2snip/core";
import {
	SnippetCollection,
	readSnippetDirectory,
	writeSnippetFiles,
	type SnipMateWriteResult,
	type SnippetReadSummary,
} from "@tm2snip/snippets";
import { logMessage } from "../utils/log.js";

/**
 * Resolved settings for one conversion run.
 */
export interface ConvertCommandOptions {
	/** Namespace suffix. */
	domain: string;
	/** Target format name for file headers and the summary line. */
	formatName: string;
	/** Program named in the banner of every written file. */
	generator: string;
	/** Banner time (default: now). */
	now?: Date;
}

/**
 * Reads the snippets in the source directory, logging each skipped file.
 *
 * @returns The read summary, or null when the directory could not be listed.
 */
function readSnippets(
	sourceDir: string,
	collection: SnippetCollection,
	options: ConvertCommandOptions,
): SnippetReadSummary | null {
	try {
		return readSnippetDirectory(sourceDir, collection, {
			domain: options.domain,
			onRejected: (rejection) => logMessage(`${rejection.error.message}. Skipping...`, "warn"),
		});
	} catch (error) {
		if (error instanceof SourceDirectoryError) {
			logMessage(`Could not open directory '${sourceDir}'. Aborting...`, "error");
			logMessage(getErrorMessage(error.cause), "debug");
			return null;
		}
		throw error;
	}
}

/**
 * Writes the collection to the target directory.
 *
 * @returns The write result, or null when the target directory is unusable.
 */
function writeSnippets(
	collection: SnippetCollection,
	targetDir: string,
	options: ConvertCommandOptions,
): SnipMateWriteResult | null {
	try {
		return writeSnippetFiles(collection, targetDir, {
			generator: options.generator,
			formatName: options.formatName,
			now: options.now,
		});
	} catch (error) {
		if (error instanceof TargetDirectoryError) {
			logMessage(`${error.message}. Aborting...`, "error");
			return null;
		}
		throw error;
	}
}

/**
 * Converts every TextMate snippet in a directory into snipMate files.
 *
 * Best effort: skipped files, output files that cannot be written and an
 * unlistable source directory are logged but still succeed. Only an
 * unusable target directory fails.
 *
 * @param sourceDir - Directory holding `.tmSnippet` files.
 * @param targetDir - Existing directory for `.snippets` files.
 * @param options - Resolved run settings.
 * @returns The process exit code.
 */
export function convertSnippetsCommand(sourceDir: string, targetDir: string, options: ConvertCommandOptions): number {
	const collection = new SnippetCollection();

	const summary = readSnippets(sourceDir, collection, options);
	if (!summary) {
		return 0;
	}

	if (summary.filesScanned === 0) {
		logMessage(`No TextMate snippets found in directory '${sourceDir}'.`, "warn");
	} else {
		logMessage(
			`Read ${summary.validSnippets} snippets out of ${summary.filesScanned} files and found ${summary.namespaceCount} namespaces.`,
			"info",
		);
	}

	if (collection.isEmpty()) {
		logMessage("No data loaded. Read some files first.", "info");
		return 0;
	}

	const result = writeSnippets(collection, targetDir, options);
	if (!result) {
		return 1;
	}

	for (const failure of result.failed) {
		logMessage(`Could not write '${failure.filePath}': ${getErrorMessage(failure.error)}. Skipping...`, "warn");
	}
	for (const file of result.files) {
		logMessage(`Wrote ${file.snippetCount} snippets to '${file.filePath}'.`, "debug");
	}
	logMessage(
		`Successfully wrote ${result.snippetsWritten} ${options.formatName} snippets to ${result.files.length} files.`,
		"info",
	);
	return 0;
}
