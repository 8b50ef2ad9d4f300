/**
 * @title TextMate Snippet Parsing Module
 * @description Parsing for `.tmSnippet` property list files.
 *
 * A TextMate snippet is a property list whose `<dict>` alternates `<key>`
 * and `<string>` elements:
 *
 * ```xml
 * <dict>
 *   <key>content</key>
 *   <string>browser.handleErrors = True</string>
 *   ...
 * </dict>
 * ```
 *
 * Keys and values are paired by position: the n-th `<key>` in the
 * document names the n-th `<string>`.
 *
 * @module textmate
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import { getErrorMessage } from "@tm2snip/core";
import type { RequiredSnippetField, SnippetRecord } from "../types.js";
import { SnippetError } from "../errors.js";

/** The TextMate snippet file suffix. */
export const TM_SNIPPET_SUFFIX = ".tmSnippet";

const TEXT_NODE = "#text";
const ATTRIBUTES_NODE = ":@";
const KEY_ELEMENT = "key";
const VALUE_ELEMENT = "string";

const PREDEFINED_ENTITIES = new Set(["amp", "lt", "gt", "quot", "apos"]);
const ENTITY_DECLARATION = /<!ENTITY\s+([^\s%"'>]+)/g;
const NAMED_REFERENCE = /&([^\s&;#<>]+);/g;
const UNPARSED_SECTIONS = /<!\[CDATA\[[\s\S]*?\]\]>|<!--[\s\S]*?-->/g;

// Named references are checked against XML before parsing, so the HTML
// table only ever decodes numeric character references.
const parser = new XMLParser({
	preserveOrder: true,
	ignoreAttributes: true,
	ignoreDeclaration: true,
	ignorePiTags: true,
	parseTagValue: false,
	trimValues: false,
	processEntities: true,
	htmlEntities: true,
	textNodeName: TEXT_NODE,
});

/**
 * A snippet file that produced a valid record.
 */
export interface TmSnippetAccepted {
	status: "valid";
	/** The parsed record. */
	record: SnippetRecord;
	/** Full path to the snippet file. */
	snippetPath: string;
}

/**
 * A snippet file that was skipped.
 */
export interface TmSnippetRejection {
	status: "rejected";
	/** Why the file was skipped. */
	error: SnippetError;
	/** Full path to the snippet file. */
	snippetPath: string;
}

export type TmSnippetReadResult = TmSnippetAccepted | TmSnippetRejection;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Concatenate every text node below an ordered element's children.
 */
function textContent(children: unknown): string {
	if (!Array.isArray(children)) {
		return "";
	}
	let text = "";
	for (const child of children) {
		if (!isRecord(child)) {
			continue;
		}
		for (const [name, value] of Object.entries(child)) {
			if (name === ATTRIBUTES_NODE) {
				continue;
			}
			text += name === TEXT_NODE ? String(value) : textContent(value);
		}
	}
	return text;
}

/**
 * Walk an ordered document tree and collect the text of `<key>` and
 * `<string>` elements, each list in document order.
 */
function collectKeyValueText(nodes: unknown, keys: string[], values: string[]): void {
	if (!Array.isArray(nodes)) {
		return;
	}
	for (const node of nodes) {
		if (!isRecord(node)) {
			continue;
		}
		for (const [name, children] of Object.entries(node)) {
			if (name === ATTRIBUTES_NODE || name === TEXT_NODE) {
				continue;
			}
			if (name === KEY_ELEMENT) {
				keys.push(textContent(children));
			} else if (name === VALUE_ELEMENT) {
				values.push(textContent(children));
			}
			collectKeyValueText(children, keys, values);
		}
	}
}

/**
 * Find the first named entity reference that XML does not define and the
 * document does not declare. CDATA sections and comments are not scanned.
 */
function findUndefinedEntity(content: string): string | undefined {
	const declared = new Set(Array.from(content.matchAll(ENTITY_DECLARATION), (match) => match[1]));
	const markup = content.replace(UNPARSED_SECTIONS, "");
	for (const [, name] of markup.matchAll(NAMED_REFERENCE)) {
		if (!PREDEFINED_ENTITIES.has(name) && !declared.has(name)) {
			return name;
		}
	}
	return undefined;
}

function isElement(node: unknown): boolean {
	return isRecord(node) && Object.keys(node).some((name) => name !== TEXT_NODE && name !== ATTRIBUTES_NODE);
}

function countElements(nodes: unknown): number {
	return Array.isArray(nodes) ? nodes.filter(isElement).length : 0;
}

function requireField(
	fields: Map<string, string>,
	field: RequiredSnippetField,
	fileName: string,
	snippetPath?: string,
): string {
	const value = fields.get(field);
	if (value === undefined) {
		throw new SnippetError(`Required key '${field}' is missing in snippet '${fileName}'`, {
			reason: "missing-field",
			snippetPath,
		});
	}
	return value;
}

/**
 * Parse a TextMate snippet from its XML content.
 *
 * When a key appears more than once, the last value wins.
 * Required keys are checked in the order content, name, scope, tabTrigger.
 * `uuid` and any other unrecognised key is dropped.
 *
 * @param content - XML content.
 * @param fileName - File name used in error messages.
 * @param snippetPath - Full path for error suggestions (optional).
 * @returns The snippet record.
 * @throws SnippetError if the content is not a complete snippet.
 */
export function parseTmSnippetContent(content: string, fileName: string, snippetPath?: string): SnippetRecord {
	const invalidSource = (cause: unknown) =>
		new SnippetError(`'${fileName}' is not a valid TextMate snippet`, {
			reason: "invalid-source",
			snippetPath,
			cause,
		});

	const validation = XMLValidator.validate(content);
	if (validation !== true) {
		throw invalidSource(new Error(`${validation.err.msg} (line ${validation.err.line})`));
	}
	const undefinedEntity = findUndefinedEntity(content);
	if (undefinedEntity !== undefined) {
		throw invalidSource(new Error(`Undefined entity '&${undefinedEntity};'`));
	}

	let document: unknown;
	try {
		document = parser.parse(content);
	} catch (error) {
		throw invalidSource(error);
	}
	const rootElements = countElements(document);
	if (rootElements !== 1) {
		throw invalidSource(new Error(`Expected one root element, found ${rootElements}`));
	}

	const keys: string[] = [];
	const values: string[] = [];
	collectKeyValueText(document, keys, values);

	if (keys.length === 0 || values.length === 0) {
		throw new SnippetError(`'${fileName}' has invalid snippet information`, {
			reason: "invalid-information",
			snippetPath,
		});
	}
	if (keys.length !== values.length) {
		throw new SnippetError(`'${fileName}' is missing some snippet information`, {
			reason: "missing-information",
			snippetPath,
		});
	}

	const fields = new Map<string, string>();
	keys.forEach((key, index) => {
		fields.set(key, values[index]);
	});

	const field = (key: RequiredSnippetField) => requireField(fields, key, fileName, snippetPath);

	return {
		content: field("content"),
		name: field("name"),
		scope: field("scope"),
		tabTrigger: field("tabTrigger"),
	};
}

/**
 * Read and parse a single `.tmSnippet` file.
 * Never throws: unreadable or malformed files come back as rejections.
 *
 * @param snippetPath - Full path to the snippet file.
 * @returns The parsed record or the reason the file was skipped.
 */
export function readTmSnippet(snippetPath: string): TmSnippetReadResult {
	const fileName = path.basename(snippetPath);

	let content: string;
	try {
		content = fs.readFileSync(snippetPath, "utf-8");
	} catch (error) {
		return {
			status: "rejected",
			error: new SnippetError(`Failed to read snippet file '${fileName}': ${getErrorMessage(error)}`, {
				reason: "unreadable",
				snippetPath,
				cause: error,
			}),
			snippetPath,
		};
	}

	try {
		return { status: "valid", record: parseTmSnippetContent(content, fileName, snippetPath), snippetPath };
	} catch (error) {
		if (error instanceof SnippetError) {
			return { status: "rejected", error, snippetPath };
		}
		throw error;
	}
}
