/**
 * Filesystem module exports.
 */

export { type SourceFileEntry, listSourceFiles, assertWritableDirectory } from "./directory.js";
