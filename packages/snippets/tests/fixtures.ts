/**
 * Builders for `.tmSnippet` test documents.
 */

/** Escape text for use inside an XML element. */
export function escapeXml(text: string): string {
	return text.replaceAll("&", "&amp;").replaceAll("<", "&lt;").replaceAll(">", "&gt;");
}

/**
 * Build a TextMate property list from ordered key/value pairs.
 */
export function tmSnippetXml(pairs: Array<[string, string]>): string {
	const body = pairs
		.map(([key, value]) => `\t<key>${escapeXml(key)}</key>\n\t<string>${escapeXml(value)}</string>\n`)
		.join("");
	return (
		'<?xml version="1.0" encoding="UTF-8"?>\n' +
		'<!DOCTYPE plist PUBLIC "-//Apple//DTD PLIST 1.0//EN" "http://www.apple.com/DTDs/PropertyList-1.0.dtd">\n' +
		'<plist version="1.0">\n<dict>\n' +
		body +
		"</dict>\n</plist>\n"
	);
}

/**
 * Build a complete snippet document with a uuid entry.
 */
export function completeTmSnippet(fields: {
	content: string;
	name: string;
	scope: string;
	tabTrigger: string;
}): string {
	return tmSnippetXml([
		["content", fields.content],
		["name", fields.name],
		["scope", fields.scope],
		["tabTrigger", fields.tabTrigger],
		["uuid", "00000000-0000-0000-0000-000000000000"],
	]);
}
