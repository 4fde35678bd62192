import type { FileTagSet, TagEntry, TagTable } from "@/types/metadata";

/** Scalar entry with sensible defaults; override any field. */
export function makeEntry(
	shortName: string,
	text: string,
	overrides: Partial<TagEntry> = {},
): TagEntry {
	return {
		shortName,
		displayName: shortName.replace(/([a-z])([A-Z])/g, "$1 $2"),
		instance: "",
		table: ["Exif", "Main"] satisfies TagTable,
		value: { kind: "scalar", text },
		...overrides,
	};
}

export function makeFile(path: string, entries: TagEntry[]): FileTagSet {
	return { path, entries };
}
