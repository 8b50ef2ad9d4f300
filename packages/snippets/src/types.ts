/**
 * @title Snippet Types
 * @description Types for TextMate snippet records and their grouping.
 *
 * @module types
 */

/**
 * Fields every TextMate snippet must define, in the order they are checked.
 */
export const REQUIRED_SNIPPET_FIELDS = ["content", "name", "scope", "tabTrigger"] as const;

export type RequiredSnippetField = (typeof REQUIRED_SNIPPET_FIELDS)[number];

/**
 * A single snippet read from a `.tmSnippet` file.
 * Keys other than the required fields (such as `uuid`) are not kept.
 */
export type SnippetRecord = Record<RequiredSnippetField, string>;

/**
 * A snippet after scope canonicalisation, paired with its namespace key.
 */
export interface NormalisedSnippet {
	/** Record whose scope uses dots only. */
	record: SnippetRecord;
	/** Grouping key, also used as the output file stem. */
	namespace: string;
}
