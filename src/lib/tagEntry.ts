import type {
	JsonValue,
	TagEntry,
	TagEntryKey,
	TagTable,
	TagValue,
} from "@/types/metadata";

const FAMILY_FILTER_OPEN = "<<";
const FAMILY_FILTER_CLOSE = ">>";

function renderItem(item: JsonValue): string {
	return JSON.stringify(item);
}

/**
 * Render a value for display. List items keep their JSON form, so strings
 * inside a list show up quoted.
 */
export function renderValue(value: TagValue): string {
	switch (value.kind) {
		case "scalar":
			return value.text;
		case "list":
			return value.items.map(renderItem).join(" ");
	}
}

/**
 * `filter` must already be lowercased. Scalars are compared case-insensitively;
 * list items are compared as rendered, without lowercasing them.
 */
function valueMatches(value: TagValue, filter: string): boolean {
	switch (value.kind) {
		case "scalar":
			return value.text.toLowerCase().includes(filter);
		case "list":
			return value.items.some((item) => renderItem(item).includes(filter));
	}
}

export function tableToString(table: TagTable): string {
	const [group, subgroup] = table;
	return subgroup === "" ? group : `${group}::${subgroup}`;
}

export function familyFilterFor(entry: TagEntry): string {
	return `${FAMILY_FILTER_OPEN}${tableToString(entry.table)}${FAMILY_FILTER_CLOSE}`;
}

/**
 * Case-insensitive filter test. `<<X>>` restricts matching to the tag family
 * (`group` or `group::subgroup`); anything else is looked up in the names and
 * both value renderings.
 */
export function entryMatchesFilter(entry: TagEntry, filter: string): boolean {
	const lowered = filter.toLowerCase();
	if (
		lowered.length >= FAMILY_FILTER_OPEN.length + FAMILY_FILTER_CLOSE.length &&
		lowered.startsWith(FAMILY_FILTER_OPEN) &&
		lowered.endsWith(FAMILY_FILTER_CLOSE)
	) {
		const family = lowered.slice(
			FAMILY_FILTER_OPEN.length,
			lowered.length - FAMILY_FILTER_CLOSE.length,
		);
		return tableToString(entry.table).toLowerCase().includes(family);
	}

	return (
		entry.displayName.toLowerCase().includes(lowered) ||
		entry.shortName.toLowerCase().includes(lowered) ||
		valueMatches(entry.value, lowered) ||
		(entry.numericValue !== undefined &&
			valueMatches(entry.numericValue, lowered))
	);
}

export function numericOrValue(entry: TagEntry): string {
	return renderValue(entry.numericValue ?? entry.value);
}

export function formatTagId(id: number | undefined): string {
	if (id === undefined) return "Unknown";
	return `${id} (0x${id.toString(16).toUpperCase()})`;
}

/** Multi-line summary used for clipboard export. */
export function renderEntry(entry: TagEntry): string {
	const lines = [
		`Name: ${entry.displayName}`,
		`Short name: ${entry.shortName}`,
		`Tag ID: ${formatTagId(entry.id)}`,
		`Tag family: ${tableToString(entry.table)}`,
		`Tag value: ${renderValue(entry.value)}`,
		`Tag numerical value: ${numericOrValue(entry)}`,
	];
	if (entry.index !== undefined) {
		lines.push(`Tag index: ${entry.index}`);
	}
	return lines.join("\n");
}

/** Text shown in a value cell for the current display mode. */
export function displayValue(entry: TagEntry, numerical: boolean): string {
	if (entry.binarySizeKb !== undefined) {
		return `${entry.binarySizeKb.toFixed(1)}Kb binary data; Can be extracted`;
	}
	if (numerical && entry.numericValue !== undefined) {
		return renderValue(entry.numericValue);
	}
	return renderValue(entry.value);
}

export function displayName(entry: TagEntry, short: boolean): string {
	return short ? entry.shortName : entry.displayName;
}

function valuesEqual(a: TagValue, b: TagValue): boolean {
	if (a.kind === "scalar" && b.kind === "scalar") return a.text === b.text;
	if (a.kind === "list" && b.kind === "list") {
		return (
			a.items.length === b.items.length &&
			a.items.every((item, i) => renderItem(item) === renderItem(b.items[i]))
		);
	}
	return false;
}

/**
 * Equality used by the compare view's diff test. Display name, numeric value
 * and instance do not take part.
 */
export function entriesEqual(a: TagEntry, b: TagEntry): boolean {
	return (
		a.shortName === b.shortName &&
		a.binarySizeKb === b.binarySizeKb &&
		a.id === b.id &&
		a.table[0] === b.table[0] &&
		a.table[1] === b.table[1] &&
		valuesEqual(a.value, b.value) &&
		a.index === b.index
	);
}

export function entryKey(entry: TagEntry): TagEntryKey {
	return { shortName: entry.shortName, table: entry.table };
}

/** Stable string form of a key, usable as a `Map` key. */
export function keyToString(key: TagEntryKey): string {
	return [key.shortName, key.table[0], key.table[1]].join("\u0000");
}

export function isWarning(entry: TagEntry): boolean {
	return entry.shortName.toLowerCase().includes("warning");
}

export function isError(entry: TagEntry): boolean {
	return entry.shortName.toLowerCase().includes("error");
}

/** Documentation page for the entry's tag family. */
export function tagDocsUrl(entry: TagEntry, baseUrl: string): string {
	const group = entry.table[0] === "Exif" ? "EXIF" : entry.table[0];
	return `${baseUrl.replace(/\/+$/, "")}/${group}.html`;
}
