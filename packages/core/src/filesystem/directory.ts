/**
 * @title Directory Module
 * @description Source listing and target checks for conversion runs.
 *
 * @module filesystem
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { SourceDirectoryError, TargetDirectoryError, getErrorMessage } from "../errors.js";

/**
 * A candidate source file found in a directory listing.
 */
export interface SourceFileEntry {
	/** Full path to the file. */
	path: string;
	/** File name (basename). */
	name: string;
}

/**
 * List the files directly inside a directory whose names end with a suffix.
 *
 * The scan is not recursive and the suffix match is case-sensitive.
 * Directories are skipped even when their names match. Entries are
 * returned in the order the operating system lists them.
 *
 * @param directory - Directory to list.
 * @param suffix - File name suffix, including the leading dot.
 * @returns Matching entries.
 * @throws SourceDirectoryError if the directory cannot be listed.
 */
export function listSourceFiles(directory: string, suffix: string): SourceFileEntry[] {
	let entries: fs.Dirent[];
	try {
		entries = fs.readdirSync(directory, { withFileTypes: true });
	} catch (error) {
		throw new SourceDirectoryError(`Could not open directory '${directory}': ${getErrorMessage(error)}`, {
			directory,
			cause: error,
		});
	}

	return entries
		.filter((entry) => !entry.isDirectory() && entry.name.endsWith(suffix))
		.map((entry) => ({ path: path.join(directory, entry.name), name: entry.name }));
}

/**
 * Ensure a directory exists and can be written to.
 *
 * @param directory - Directory to check.
 * @throws TargetDirectoryError if it is missing, not a directory, or read-only.
 */
export function assertWritableDirectory(directory: string): void {
	let stats: fs.Stats;
	try {
		stats = fs.statSync(directory);
	} catch (error) {
		throw new TargetDirectoryError(`Target directory '${directory}' does not exist`, { directory, cause: error });
	}

	if (!stats.isDirectory()) {
		throw new TargetDirectoryError(`Target path '${directory}' is not a directory`, { directory });
	}

	try {
		fs.accessSync(directory, fs.constants.W_OK);
	} catch (error) {
		throw new TargetDirectoryError(`Target directory '${directory}' is not writable`, { directory, cause: error });
	}
}
