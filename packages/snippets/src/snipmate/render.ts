/**
 * @title snipMate Rendering
 * @description Serialisation of snippet records into snipMate `.snippets` text.
 *
 * @module snipmate
 */

import type { SnippetRecord } from "../types.js";

/** Name of the target format, shown in file headers. */
export const SNIPMATE_FORMAT_NAME = "snipMate";

/** The snipMate snippet file suffix. */
export const SNIPMATE_SUFFIX = ".snippets";

/**
 * Values for the two comment lines at the top of a snippets file.
 */
export interface SnippetFileBanner {
	/** Target format name for the first header line. */
	formatName: string;
	/** Program that generated the file. */
	generator: string;
	/** Human-readable generation time. */
	timestamp: string;
}

/**
 * Drop the leading word of a multi-word snippet name.
 * TextMate names usually start with a category word that the namespace
 * already conveys ("Django Model Field" becomes "Model Field").
 *
 * @param name - Snippet name.
 * @returns The name without its first space-delimited token, or unchanged when it has no space.
 */
export function snippetDisplayName(name: string): string {
	const separator = name.indexOf(" ");
	return separator === -1 ? name : name.slice(separator + 1);
}

/**
 * Indent a snippet body by one tab on every line.
 */
export function indentSnippetBody(content: string): string {
	return `\t${content.replaceAll("\n", "\n\t")}`;
}

/**
 * Render one snippet entry, followed by a blank line.
 *
 * @example
 * ```typescript
 * renderSnippetEntry({ name: "My Title", tabTrigger: "mt", content: "a\nb", scope: "source.python" });
 * // "# Title\nsnippet mt Title\n\ta\n\tb\n\n"
 * ```
 */
export function renderSnippetEntry(record: SnippetRecord): string {
	const displayName = snippetDisplayName(record.name);
	return `# ${displayName}\nsnippet ${record.tabTrigger} ${displayName}\n${indentSnippetBody(record.content)}\n\n`;
}

/**
 * Render the header comment lines of a snippets file.
 */
export function renderSnippetFileHeader(namespace: string, banner: SnippetFileBanner): string {
	return `# ${namespace} snippets for ${banner.formatName}.\n# Created by ${banner.generator} @ ${banner.timestamp}\n\n`;
}

/**
 * Render a complete snippets file for one namespace.
 *
 * @param namespace - Namespace key.
 * @param records - Records of the namespace, rendered in the given order.
 * @param banner - Header values.
 * @returns File content.
 */
export function renderSnippetFile(
	namespace: string,
	records: readonly SnippetRecord[],
	banner: SnippetFileBanner,
): string {
	return renderSnippetFileHeader(namespace, banner) + records.map(renderSnippetEntry).join("");
}

/**
 * Format a date as local `YYYY-MM-DD HH:MM:SS`.
 */
export function formatTimestamp(date: Date): string {
	const pad = (value: number) => String(value).padStart(2, "0");
	const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
	const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
	return `${day} ${time}`;
}
