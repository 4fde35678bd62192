export type JsonValue =
	| string
	| number
	| boolean
	| null
	| JsonValue[]
	| { [key: string]: JsonValue };

export type TagValue =
	| { kind: "scalar"; text: string }
	| { kind: "list"; items: JsonValue[] };

/** Tag namespace, e.g. `["Exif", "Main"]`; the subgroup may be empty. */
export type TagTable = readonly [group: string, subgroup: string];

export interface TagEntry {
	shortName: string;
	displayName: string;
	/** Copy instance reported by exiftool (`Copy1`, ...), empty for the main one. */
	instance: string;
	id?: number;
	table: TagTable;
	value: TagValue;
	numericValue?: TagValue;
	index?: number;
	/** Present only for fields carrying an extractable binary payload. */
	binarySizeKb?: number;
}

export interface TagEntryKey {
	shortName: string;
	table: TagTable;
}

export interface FileTagSet {
	path: string;
	entries: TagEntry[];
}

export interface CompareRow {
	representative: TagEntry;
	/** Index-aligned with the loaded files; `null` where a file lacks the tag. */
	perFile: (TagEntry | null)[];
}

export interface DisplayMode {
	short: boolean;
	numerical: boolean;
}

export interface CompareMode {
	enabled: boolean;
	onlyDiff: boolean;
}
