/**
 * @title Snippet Collection
 * @description Namespace-keyed grouping of snippet records for one run.
 *
 * @module collection
 */

import type { SnippetRecord } from "./types.js";

/**
 * Snippet records grouped by namespace key.
 *
 * Append-only: records keep their arrival order inside a namespace.
 * The order in which namespaces are enumerated is not part of the contract.
 */
export class SnippetCollection {
	private groups = new Map<string, SnippetRecord[]>();
	private total = 0;

	/**
	 * Append a record to a namespace, creating the namespace if needed.
	 */
	add(namespace: string, record: SnippetRecord): void {
		const group = this.groups.get(namespace);
		if (group) {
			group.push(record);
		} else {
			this.groups.set(namespace, [record]);
		}
		this.total += 1;
	}

	/**
	 * Check whether no record has been added.
	 */
	isEmpty(): boolean {
		return this.total === 0;
	}

	/**
	 * Get the records of a namespace, in arrival order.
	 *
	 * @returns The records, or an empty list for an unknown namespace.
	 */
	get(namespace: string): readonly SnippetRecord[] {
		return this.groups.get(namespace) ?? [];
	}

	/**
	 * List the namespace keys.
	 */
	namespaces(): string[] {
		return [...this.groups.keys()];
	}

	/**
	 * Enumerate `[namespace, records]` pairs.
	 */
	*entries(): IterableIterator<[string, readonly SnippetRecord[]]> {
		yield* this.groups.entries();
	}

	/** Number of distinct namespaces. */
	get namespaceCount(): number {
		return this.groups.size;
	}

	/** Number of records across all namespaces. */
	get snippetCount(): number {
		return this.total;
	}
}
