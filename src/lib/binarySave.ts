import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { pathExists } from "./fileUtils";

export interface SaveTarget {
	name: string;
	extension: string;
}

export type SaveTargetResult =
	| { ok: true; path: string }
	| { ok: false; error: string };

export function normaliseExtension(extension: string): string {
	return extension.replace(/^\./, "");
}

/**
 * Validate a file name and extension against `directory`. Existing files are
 * never overwritten.
 */
export async function resolveSaveTarget(
	directory: string,
	target: SaveTarget,
): Promise<SaveTargetResult> {
	if (target.name === "") {
		return { ok: false, error: "Please enter a name." };
	}
	const extension = normaliseExtension(target.extension);
	if (extension === "") {
		return { ok: false, error: "Please enter an extension." };
	}

	const path = join(directory, `${target.name}.${extension}`);
	if (await pathExists(path)) {
		return { ok: false, error: "File with this name already exists!" };
	}
	return { ok: true, path };
}

/** Create `path` with `data`; fails if the file appeared in the meantime. */
export async function writeBinaryFile(
	path: string,
	data: Uint8Array,
): Promise<void> {
	await writeFile(path, data, { flag: "wx" });
}
