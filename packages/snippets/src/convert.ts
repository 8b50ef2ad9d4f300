/**
 * @title Conversion Pipeline
 * @description Reads a directory of TextMate snippets into a collection
 * and writes the collection as snipMate files.
 *
 * Reading completes before writing begins.
 *
 * @module convert
 */

import { listSourceFiles } from "@tm2snip/core";
import { SnippetCollection } from "./collection.js";
import { DEFAULT_NAMESPACE_DOMAIN, normaliseSnippet } from "./normalise.js";
import { TM_SNIPPET_SUFFIX, readTmSnippet, type TmSnippetRejection } from "./textmate/tmsnippet.js";
import { writeSnippetFiles, type SnipMateWriteOptions, type SnipMateWriteResult } from "./snipmate/write.js";

/**
 * Options for reading a snippet directory.
 */
export interface SnippetReadOptions {
	/** Namespace suffix (default: "zope"). */
	domain?: string;
	/** Called for each skipped file, as soon as it is skipped. */
	onRejected?: (rejection: TmSnippetRejection) => void;
}

/**
 * Counts gathered while reading a snippet directory.
 */
export interface SnippetReadSummary {
	/** Directory that was read. */
	sourceDir: string;
	/** Number of `.tmSnippet` files found, valid or not. */
	filesScanned: number;
	/** Number of files that produced a record. */
	validSnippets: number;
	/** Number of namespaces in the collection after reading. */
	namespaceCount: number;
	/** Files that were skipped, in reading order. */
	rejected: TmSnippetRejection[];
}

/**
 * Read every `.tmSnippet` file directly inside a directory into a collection.
 *
 * Malformed files are skipped and reported; they never abort the read.
 *
 * @param sourceDir - Directory holding `.tmSnippet` files.
 * @param collection - Collection that receives the records.
 * @param options - Read options.
 * @returns Read summary.
 * @throws SourceDirectoryError if the directory cannot be listed.
 */
export function readSnippetDirectory(
	sourceDir: string,
	collection: SnippetCollection,
	options: SnippetReadOptions = {},
): SnippetReadSummary {
	const { domain = DEFAULT_NAMESPACE_DOMAIN, onRejected } = options;

	const sourceFiles = listSourceFiles(sourceDir, TM_SNIPPET_SUFFIX);
	const rejected: TmSnippetRejection[] = [];
	let validSnippets = 0;

	for (const sourceFile of sourceFiles) {
		const result = readTmSnippet(sourceFile.path);
		if (result.status === "rejected") {
			rejected.push(result);
			onRejected?.(result);
			continue;
		}

		const { record, namespace } = normaliseSnippet(result.record, domain);
		collection.add(namespace, record);
		validSnippets += 1;
	}

	return {
		sourceDir,
		filesScanned: sourceFiles.length,
		validSnippets,
		namespaceCount: collection.namespaceCount,
		rejected,
	};
}

/**
 * Options for a full conversion.
 */
export interface ConvertOptions extends SnippetReadOptions, SnipMateWriteOptions {}

/**
 * Result of a full conversion.
 */
export interface ConvertResult {
	read: SnippetReadSummary;
	write: SnipMateWriteResult;
}

/**
 * Convert a directory of TextMate snippets into snipMate files.
 *
 * @param sourceDir - Directory holding `.tmSnippet` files.
 * @param targetDir - Existing, writable output directory.
 * @param options - Read and write options.
 * @returns Read and write summaries.
 * @throws SourceDirectoryError if the source directory cannot be listed.
 * @throws TargetDirectoryError if there is something to write and the target is unusable.
 */
export function convertSnippets(sourceDir: string, targetDir: string, options: ConvertOptions): ConvertResult {
	const collection = new SnippetCollection();
	const read = readSnippetDirectory(sourceDir, collection, options);
	const write = writeSnippetFiles(collection, targetDir, options);
	return { read, write };
}
