/**
 * snipMate module exports.
 */

export {
	SNIPMATE_FORMAT_NAME,
	SNIPMATE_SUFFIX,
	type SnippetFileBanner,
	snippetDisplayName,
	indentSnippetBody,
	renderSnippetEntry,
	renderSnippetFileHeader,
	renderSnippetFile,
	formatTimestamp,
} from "./render.js";

export {
	type SnipMateWriteOptions,
	type SnipMateFile,
	type SnipMateWriteFailure,
	type SnipMateWriteResult,
	snippetFilePath,
	writeSnippetFiles,
} from "./write.js";
