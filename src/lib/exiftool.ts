/**
 * exiftool integration: runs the tool, turns its `-j -G4 -l -D -t` JSON into
 * tag entries, and pulls single binary payloads out of a file.
 */

import { execFile } from "node:child_process";
import type {
	FileTagSet,
	JsonValue,
	TagEntry,
	TagTable,
	TagValue,
} from "@/types/metadata";
import type { AppSettings } from "./config";
import { createLogger } from "./logger";

const log = createLogger("Exiftool");

const MAX_OUTPUT_BYTES = 512 * 1024 * 1024;
const BINARY_MARKER = /^\(Binary data (\d+) bytes/;
const EXTRACT_ARGS = ["-j", "-G4", "-l", "-D", "-t"];

export type ExtractionErrorKind = "unavailable" | "empty" | "malformed";

export class ExtractionError extends Error {
	constructor(
		readonly kind: ExtractionErrorKind,
		message: string,
	) {
		super(message);
		this.name = "ExtractionError";
	}
}

// ============================================================================
// Output parsing
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isJsonValue(value: unknown): value is JsonValue {
	if (
		value === null ||
		typeof value === "string" ||
		typeof value === "number" ||
		typeof value === "boolean"
	) {
		return true;
	}
	if (Array.isArray(value)) return value.every(isJsonValue);
	if (isRecord(value)) return Object.values(value).every(isJsonValue);
	return false;
}

function parseValue(raw: unknown): TagValue | null {
	if (typeof raw === "string") return { kind: "scalar", text: raw };
	if (typeof raw === "number" || typeof raw === "boolean") {
		return { kind: "scalar", text: String(raw) };
	}
	if (Array.isArray(raw) && raw.every(isJsonValue)) {
		return { kind: "list", items: raw };
	}
	return null;
}

function parseUnsigned(raw: unknown): number | undefined {
	return typeof raw === "number" && Number.isInteger(raw) && raw >= 0
		? raw
		: undefined;
}

/** `Exif::Main` becomes `["Exif", "Main"]`; a bare group gets an empty subgroup. */
export function parseTable(raw: string): TagTable {
	const sep = raw.indexOf("::");
	if (sep === -1) return [raw, ""];
	return [raw.slice(0, sep), raw.slice(sep + 2)];
}

/** Size in KiB announced by exiftool's `(Binary data N bytes, ...)` placeholder. */
export function parseBinarySize(value: TagValue): number | undefined {
	if (value.kind !== "scalar") return undefined;
	const match = BINARY_MARKER.exec(value.text);
	return match ? Number(match[1]) / 1024 : undefined;
}

function parseTag(key: string, raw: Record<string, unknown>, file: string): TagEntry {
	const sep = key.indexOf(":");
	const instance = sep === -1 ? "" : key.slice(0, sep);
	const shortName = sep === -1 ? key : key.slice(sep + 1);

	const malformed = (field: string) =>
		new ExtractionError(
			"malformed",
			`Malformed tag "${key}" in ${file}: bad or missing "${field}"`,
		);

	if (typeof raw.desc !== "string") throw malformed("desc");
	if (typeof raw.table !== "string") throw malformed("table");

	const value = parseValue(raw.val);
	if (!value) throw malformed("val");

	let numericValue: TagValue | undefined;
	if (raw.num !== undefined) {
		const parsed = parseValue(raw.num);
		if (!parsed) throw malformed("num");
		numericValue = parsed;
	}

	return {
		shortName,
		displayName: raw.desc,
		instance,
		id: parseUnsigned(raw.id),
		table: parseTable(raw.table),
		value,
		numericValue,
		index: parseUnsigned(raw.index),
		binarySizeKb: parseBinarySize(value),
	};
}

function parseFile(raw: unknown, position: number): FileTagSet {
	if (!isRecord(raw)) {
		throw new ExtractionError(
			"malformed",
			`Record #${position + 1} is not an object`,
		);
	}
	const path = raw.SourceFile;
	if (typeof path !== "string") {
		throw new ExtractionError(
			"malformed",
			`Record #${position + 1} has no SourceFile`,
		);
	}

	const entries: TagEntry[] = [];
	for (const [key, value] of Object.entries(raw)) {
		if (isRecord(value)) {
			entries.push(parseTag(key, value, path));
		}
	}
	return { path, entries };
}

/**
 * Parse the JSON printed by exiftool. Fails with `empty` when no file yielded
 * any tag, and with `malformed` on the first record it cannot read.
 */
export function parseExiftoolOutput(json: string): FileTagSet[] {
	let parsed: unknown;
	try {
		parsed = JSON.parse(json);
	} catch (error) {
		throw new ExtractionError(
			"malformed",
			`exiftool output is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
		);
	}
	if (!Array.isArray(parsed)) {
		throw new ExtractionError("malformed", "exiftool output is not an array");
	}

	const files = parsed.map(parseFile);
	if (files.every((file) => file.entries.length === 0)) {
		throw new ExtractionError("empty", "exiftool returned no data for any file");
	}
	return files;
}

// ============================================================================
// Process invocation
// ============================================================================

interface ExecResult {
	stdout: Buffer;
	stderr: string;
	failure: Error | null;
}

function execExiftool(exiftoolPath: string, args: string[]): Promise<ExecResult> {
	return new Promise((resolve) => {
		execFile(
			exiftoolPath,
			args,
			{ encoding: "buffer", maxBuffer: MAX_OUTPUT_BYTES },
			(error, stdout, stderr) => {
				resolve({ stdout, stderr: stderr.toString("utf8"), failure: error });
			},
		);
	});
}

function unavailable(exiftoolPath: string, result: ExecResult): ExtractionError {
	const reason = result.stderr.trim() || result.failure?.message || "no output";
	return new ExtractionError(
		"unavailable",
		`Failed to run ${exiftoolPath}: ${reason}`,
	);
}

/**
 * Read metadata for every input path. exiftool exits non-zero when some of
 * the inputs fail, so its output is used whenever there is any.
 */
export async function runExiftool(
	paths: string[],
	recursive: boolean,
	settings: Pick<AppSettings, "exiftoolPath">,
): Promise<FileTagSet[]> {
	const args = [...paths, ...EXTRACT_ARGS];
	if (recursive) args.push("-r");

	log.debug(`Running ${settings.exiftoolPath} ${args.join(" ")}`);
	const result = await execExiftool(settings.exiftoolPath, args);

	if (result.stdout.length === 0) {
		if (result.failure) throw unavailable(settings.exiftoolPath, result);
		throw new ExtractionError("empty", "exiftool returned no data for any file");
	}
	if (result.failure) {
		log.warn("exiftool reported problems:", result.stderr.trim());
	}

	const files = parseExiftoolOutput(result.stdout.toString("utf8"));
	log.info(`Loaded ${files.length} file(s)`);
	return files;
}

/** Raw bytes of one binary tag, as printed by `exiftool -<tag> -b`. */
export async function extractBinary(
	path: string,
	entry: Pick<TagEntry, "shortName" | "binarySizeKb">,
	settings: Pick<AppSettings, "exiftoolPath">,
): Promise<Buffer> {
	if (entry.binarySizeKb === undefined) {
		throw new ExtractionError(
			"empty",
			`${entry.shortName} does not contain any binary data`,
		);
	}

	const result = await execExiftool(settings.exiftoolPath, [
		path,
		`-${entry.shortName}`,
		"-b",
	]);
	if (result.failure) throw unavailable(settings.exiftoolPath, result);
	if (result.stdout.length === 0) {
		throw new ExtractionError(
			"empty",
			`exiftool returned no binary data for ${entry.shortName}`,
		);
	}
	log.debug(`Extracted ${result.stdout.length} bytes of ${entry.shortName}`);
	return result.stdout;
}
