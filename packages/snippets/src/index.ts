/**
 * @tm2snip/snippets - TextMate to snipMate snippet conversion.
 *
 * This library provides functionality for:
 * - Snippet record types (SnippetRecord, NormalisedSnippet)
 * - TextMate snippet parsing (.tmSnippet)
 * - Scope canonicalisation and namespace derivation
 * - Namespace-keyed snippet collections
 * - snipMate rendering and writing (.snippets)
 */

// Type exports
export * from "./types.js";

// Error exports
export { SnippetError, type SnippetRejectionReason } from "./errors.js";

export * from "./normalise.js";
export { SnippetCollection } from "./collection.js";
export * from "./textmate/index.js";
export * from "./snipmate/index.js";

// Pipeline exports
export {
	type SnippetReadOptions,
	type SnippetReadSummary,
	type ConvertOptions,
	type ConvertResult,
	readSnippetDirectory,
	convertSnippets,
} from "./convert.js";
