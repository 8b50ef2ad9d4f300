/**
 * @title snipMate Writing
 * @description Writes a snippet collection as one `.snippets` file per namespace.
 *
 * @module snipmate
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { assertWritableDirectory } from "@tm2snip/core";
import type { SnippetCollection } from "../collection.js";
import { SNIPMATE_FORMAT_NAME, SNIPMATE_SUFFIX, formatTimestamp, renderSnippetFile } from "./render.js";

/**
 * Options for writing snippet files.
 */
export interface SnipMateWriteOptions {
	/** Program named in the "Created by" banner line. */
	generator: string;
	/** Target format name for the header line (default: "snipMate"). */
	formatName?: string;
	/** Generation time for the banner (default: now). */
	now?: Date;
}

/**
 * A written snippets file.
 */
export interface SnipMateFile {
	/** Namespace key the file holds. */
	namespace: string;
	/** Full path to the file. */
	filePath: string;
	/** Number of snippets written to the file. */
	snippetCount: number;
}

/**
 * A snippets file that could not be written.
 */
export interface SnipMateWriteFailure {
	namespace: string;
	filePath: string;
	/** Number of snippets lost with the file. */
	snippetCount: number;
	error: unknown;
}

/**
 * Result of writing a collection.
 */
export interface SnipMateWriteResult {
	/** Files written, one per namespace. */
	files: SnipMateFile[];
	/** Files that failed, in write order. */
	failed: SnipMateWriteFailure[];
	/** Total snippets written across all files. */
	snippetsWritten: number;
}

/**
 * Get the output path for a namespace.
 *
 * @param targetDir - Output directory.
 * @param namespace - Namespace key.
 * @returns `<targetDir>/<namespace>.snippets`
 */
export function snippetFilePath(targetDir: string, namespace: string): string {
	return path.join(targetDir, `${namespace}${SNIPMATE_SUFFIX}`);
}

/**
 * Write every namespace of a collection to its own snippets file.
 * Existing files with the same name are overwritten. A file that cannot
 * be written is recorded in `failed` and the remaining namespaces are
 * still written.
 *
 * An empty collection writes nothing and does not inspect the target.
 * Otherwise the target directory is checked once before the first write.
 *
 * @param collection - Snippets to write.
 * @param targetDir - Existing, writable output directory.
 * @param options - Banner options.
 * @returns Files written and snippet count.
 * @throws TargetDirectoryError if the target directory is missing or read-only.
 */
export function writeSnippetFiles(
	collection: SnippetCollection,
	targetDir: string,
	options: SnipMateWriteOptions,
): SnipMateWriteResult {
	if (collection.isEmpty()) {
		return { files: [], failed: [], snippetsWritten: 0 };
	}

	assertWritableDirectory(targetDir);

	const banner = {
		formatName: options.formatName ?? SNIPMATE_FORMAT_NAME,
		generator: options.generator,
		timestamp: formatTimestamp(options.now ?? new Date()),
	};

	const files: SnipMateFile[] = [];
	const failed: SnipMateWriteFailure[] = [];
	let snippetsWritten = 0;

	for (const [namespace, records] of collection.entries()) {
		const filePath = snippetFilePath(targetDir, namespace);
		try {
			fs.writeFileSync(filePath, renderSnippetFile(namespace, records, banner), "utf-8");
		} catch (error) {
			failed.push({ namespace, filePath, snippetCount: records.length, error });
			continue;
		}
		files.push({ namespace, filePath, snippetCount: records.length });
		snippetsWritten += records.length;
	}

	return { files, failed, snippetsWritten };
}
