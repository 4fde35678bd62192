/**
 * Side-by-side comparison table: one row per distinct tag key across all
 * loaded files, with per-file slots aligned to the file order.
 */

import type { CompareRow, FileTagSet, TagEntry } from "@/types/metadata";
import { entriesEqual, entryKey, entryMatchesFilter, keyToString } from "./tagEntry";

/**
 * Index one file's entries by key. A later entry with the same key replaces
 * the earlier one.
 */
export function indexEntries(file: FileTagSet): Map<string, TagEntry> {
	const index = new Map<string, TagEntry>();
	for (const entry of file.entries) {
		index.set(keyToString(entryKey(entry)), entry);
	}
	return index;
}

/**
 * Build the union-keyed comparison table. Rows come out in first-seen order:
 * file by file, in extraction order within each file.
 */
export function buildCompareRows(files: FileTagSet[]): CompareRow[] {
	const indexes = files.map(indexEntries);
	const keys = new Set<string>();
	for (const index of indexes) {
		for (const key of index.keys()) {
			keys.add(key);
		}
	}

	const rows: CompareRow[] = [];
	for (const key of keys) {
		const perFile = indexes.map((index) => index.get(key) ?? null);
		const representative = perFile.find(
			(entry): entry is TagEntry => entry !== null,
		);
		if (representative) {
			rows.push({ representative, perFile });
		}
	}
	return rows;
}

/**
 * A row differs unless every slot is absent together with the first slot, or
 * present and equal to it.
 */
export function isDifferingRow(row: CompareRow): boolean {
	const first = row.perFile[0] ?? null;
	return !row.perFile.every((entry) => {
		if (entry === null) return first === null;
		return first !== null && entriesEqual(entry, first);
	});
}

export function rowMatchesFilter(row: CompareRow, filter: string): boolean {
	if (filter === "") return true;
	return row.perFile.some(
		(entry) => entry !== null && entryMatchesFilter(entry, filter),
	);
}
