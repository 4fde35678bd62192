import { isError, isWarning } from "@/lib/tagEntry";
import type { TagEntry } from "@/types/metadata";

export interface RowStyle {
	color?: string;
	bold?: boolean;
	inverse?: boolean;
}

/** Borders plus the column header line. */
export const TABLE_CHROME_ROWS = 3;

export function rowStyle(
	entry: TagEntry | null,
	selected: boolean,
	binary = entry?.binarySizeKb !== undefined,
): RowStyle {
	let color: string | undefined;
	if (entry && isWarning(entry)) color = "yellowBright";
	else if (entry && isError(entry)) color = "red";
	if (binary) color = "greenBright";

	return selected ? { color, bold: true, inverse: true } : { color };
}

/**
 * Split `width` columns by integer weights; the remainder goes to the last
 * column.
 */
export function splitWidth(width: number, weights: number[]): number[] {
	const total = weights.reduce((sum, w) => sum + w, 0);
	if (total <= 0) return weights.map(() => 0);

	const widths = weights.map((w) => Math.floor((width * w) / total));
	const used = widths.reduce((sum, w) => sum + w, 0);
	widths[widths.length - 1] += width - used;
	return widths;
}

/** Width available for text inside a bordered, padded column. */
export function innerWidth(width: number): number {
	return Math.max(0, width - 2);
}

export interface ScrollbarThumb {
	start: number;
	size: number;
}

/**
 * Thumb of a vertical scrollbar `track` rows tall over `total` rows, of which
 * `visible` are shown from `scroll` on. `null` when everything fits.
 */
export function scrollbarThumb(
	total: number,
	visible: number,
	scroll: number,
	track: number = visible,
): ScrollbarThumb | null {
	if (total <= visible || track <= 0) return null;
	const size = Math.min(track, Math.max(1, Math.round((track * visible) / total)));
	const room = track - size;
	const progress = Math.min(1, Math.max(0, scroll / (total - visible)));
	return { start: Math.round(progress * room), size };
}
