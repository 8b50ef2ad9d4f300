/**
 * TextMate module exports.
 */

export {
	TM_SNIPPET_SUFFIX,
	type TmSnippetAccepted,
	type TmSnippetRejection,
	type TmSnippetReadResult,
	parseTmSnippetContent,
	readTmSnippet,
} from "./tmsnippet.js";
