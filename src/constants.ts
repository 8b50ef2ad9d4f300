/**
 * Name the command-line program is published under.
 */
export const PROGRAM_NAME = "tm2snip";

/**
 * One-line description shown in usage text.
 */
export const PROGRAM_DESCRIPTION = "Convert TextMate snippets to Vim's snipMate.";

/**
 * Log level used when neither the command line nor a configuration file sets one.
 */
export const DEFAULT_LOG_LEVEL = "info";
