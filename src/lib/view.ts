import type {
	CompareMode,
	CompareRow,
	FileTagSet,
	TagEntry,
} from "@/types/metadata";
import { isDifferingRow, rowMatchesFilter } from "./compareIndex";
import { entryMatchesFilter } from "./tagEntry";

export type TagView =
	| { mode: "single"; entries: TagEntry[] }
	| { mode: "compare"; rows: CompareRow[] };

export interface ViewInput {
	files: FileTagSet[];
	compareRows: CompareRow[];
	activeFileIndex: number;
	filter: string;
	compare: CompareMode;
}

export function filterEntries(entries: TagEntry[], filter: string): TagEntry[] {
	if (filter === "") return entries;
	return entries.filter((entry) => entryMatchesFilter(entry, filter));
}

export function filterCompareRows(
	rows: CompareRow[],
	filter: string,
	onlyDiff: boolean,
): CompareRow[] {
	return rows.filter(
		(row) => rowMatchesFilter(row, filter) && (!onlyDiff || isDifferingRow(row)),
	);
}

/**
 * The rows currently on screen. Derived from scratch on every call; nothing
 * about the filtered view is cached.
 */
export function computeView(input: ViewInput): TagView {
	if (input.compare.enabled) {
		return {
			mode: "compare",
			rows: filterCompareRows(
				input.compareRows,
				input.filter,
				input.compare.onlyDiff,
			),
		};
	}
	const file = input.files[input.activeFileIndex];
	return {
		mode: "single",
		entries: file ? filterEntries(file.entries, input.filter) : [],
	};
}

export function viewLength(view: TagView): number {
	return view.mode === "compare" ? view.rows.length : view.entries.length;
}

/**
 * Entry under the cursor. In compare mode this is the active file's slot of
 * the row, which may be absent.
 */
export function selectFromView(
	view: TagView,
	cursor: number,
	activeFileIndex: number,
): TagEntry | null {
	if (view.mode === "single") {
		return view.entries[cursor] ?? null;
	}
	const row = view.rows[cursor];
	if (!row) return null;
	return row.perFile[activeFileIndex] ?? null;
}
