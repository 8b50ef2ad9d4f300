/**
 * @tm2snip/core - Shared building blocks for tm2snip.
 *
 * This library provides functionality for:
 * - Typed errors for directory and configuration failures
 * - Source directory listing and target directory checks
 * - Configuration file loading (.tm2snip.yml)
 */

// Error exports
export {
	Tm2SnipError,
	type Tm2SnipErrorOptions,
	SourceDirectoryError,
	TargetDirectoryError,
	ConfigError,
	isTm2SnipError,
	getErrorMessage,
	wrapError,
} from "./errors.js";

// Filesystem exports
export * from "./filesystem/index.js";

// Configuration exports
export * from "./config/index.js";
