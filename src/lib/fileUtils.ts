import { readdir, stat } from "node:fs/promises";

const ELLIPSIS = "...";

/**
 * Whether any input directory has a subdirectory, i.e. whether reading it
 * recursively would find more files.
 */
export async function hasSubdirectories(paths: string[]): Promise<boolean> {
	for (const path of paths) {
		if (!(await isDirectory(path))) continue;

		const children = await readdir(path, { withFileTypes: true });
		if (children.some((child) => child.isDirectory())) return true;
	}
	return false;
}

export async function isDirectory(path: string): Promise<boolean> {
	try {
		return (await stat(path)).isDirectory();
	} catch {
		return false;
	}
}

export async function pathExists(path: string): Promise<boolean> {
	try {
		await stat(path);
		return true;
	} catch {
		return false;
	}
}

/** Collapse line breaks so a value occupies exactly one screen line. */
export function singleLine(text: string): string {
	return text.replace(/\r?\n|\r/g, "↵");
}

/**
 * Fit `text` into `width` columns after skipping `offset` characters.
 * Skipped text is marked with a leading ellipsis, cut text with a trailing one.
 */
export function cutText(text: string, width: number, offset = 0): string {
	if (width <= 0) return "";
	let visible = offset > 0 ? ELLIPSIS + text.slice(offset) : text;
	if (visible.length > width) {
		visible =
			width <= ELLIPSIS.length
				? visible.slice(0, width)
				: visible.slice(0, width - ELLIPSIS.length) + ELLIPSIS;
	}
	return visible;
}

/** Keep the end of a path, which is usually the informative part. */
export function truncateStart(text: string, width: number): string {
	if (width <= 0) return "";
	if (text.length <= width) return text;
	if (width <= ELLIPSIS.length) return text.slice(text.length - width);
	return ELLIPSIS + text.slice(text.length - width + ELLIPSIS.length);
}
