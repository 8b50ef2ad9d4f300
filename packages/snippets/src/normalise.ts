/**
 * @title Snippet Normalisation
 * @description Scope canonicalisation and namespace derivation.
 *
 * @module normalise
 */

import type { NormalisedSnippet, SnippetRecord } from "./types.js";

/** Suffix appended to every namespace key unless another domain is given. */
export const DEFAULT_NAMESPACE_DOMAIN = "zope";

/**
 * Rewrite a newline-joined scope list into dotted form.
 *
 * @param scope - Scope as written in the snippet file.
 * @returns Scope with every newline replaced by a period.
 */
export function canonicaliseScope(scope: string): string {
	return scope.replaceAll("\n", ".");
}

/**
 * Compute the namespace key for a scope.
 * Format: "<segment 1>-<segment 2>-<domain>", using whichever of the
 * second and third dotted segments exist.
 *
 * @example
 * ```typescript
 * snippetNamespace("source.python.django.migrations"); // "python-django-zope"
 * snippetNamespace("source"); // "-zope"
 * ```
 *
 * @param scope - Scope, canonical or not.
 * @param domain - Namespace suffix.
 * @returns Namespace key.
 */
export function snippetNamespace(scope: string, domain: string = DEFAULT_NAMESPACE_DOMAIN): string {
	const segments = canonicaliseScope(scope).split(".");
	return `${segments.slice(1, 3).join("-")}-${domain}`;
}

/**
 * Canonicalise a record's scope and derive its namespace key.
 *
 * @param record - Validated snippet record.
 * @param domain - Namespace suffix.
 * @returns A new record and its namespace key; the input is not modified.
 */
export function normaliseSnippet(record: SnippetRecord, domain: string = DEFAULT_NAMESPACE_DOMAIN): NormalisedSnippet {
	const scope = canonicaliseScope(record.scope);
	return {
		record: { ...record, scope },
		namespace: snippetNamespace(scope, domain),
	};
}
