/**
 * Runtime settings, read once at startup from `TAGSCOPE_*` environment
 * variables. Nothing is persisted between runs.
 */

import { homedir } from "node:os";
import { join } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = [
	"debug",
	"info",
	"warn",
	"error",
	"silent",
];

export interface AppSettings {
	// Extraction
	exiftoolPath: string;

	// Binary export
	downloadLocation: string;
	defaultExtension: string;

	// UI
	scrollMargin: number;
	tagDocsBaseUrl: string;

	// Logging
	logLevel: LogLevel;
	logFile: string;
}

export function defaultSettings(home: string = homedir()): AppSettings {
	return {
		exiftoolPath: "exiftool",

		downloadLocation: join(home, "Downloads"),
		defaultExtension: "jpeg",

		scrollMargin: 5,
		tagDocsBaseUrl: "https://exiftool.org/TagNames",

		logLevel: "warn",
		logFile: "",
	};
}

// Map setting keys to environment variables
export const envKeyMap: Record<keyof AppSettings, string> = {
	exiftoolPath: "TAGSCOPE_EXIFTOOL",
	downloadLocation: "TAGSCOPE_DOWNLOAD_DIR",
	defaultExtension: "TAGSCOPE_DEFAULT_EXTENSION",
	scrollMargin: "TAGSCOPE_SCROLL_MARGIN",
	tagDocsBaseUrl: "TAGSCOPE_TAG_DOCS_URL",
	logLevel: "TAGSCOPE_LOG_LEVEL",
	logFile: "TAGSCOPE_LOG_FILE",
};

type Parser<T> = (raw: string) => T | null;

const parseText: Parser<string> = (raw) => {
	const trimmed = raw.trim();
	return trimmed === "" ? null : trimmed;
};

const parseCount: Parser<number> = (raw) => {
	const value = Number(raw.trim());
	return Number.isInteger(value) && value >= 0 ? value : null;
};

const parseLogLevel: Parser<LogLevel> = (raw) => {
	const normalised = raw.trim().toLowerCase();
	return LOG_LEVELS.find((level) => level === normalised) ?? null;
};

const parsers: { [K in keyof AppSettings]: Parser<AppSettings[K]> } = {
	exiftoolPath: parseText,
	downloadLocation: parseText,
	defaultExtension: (raw) => parseText(raw.replace(/^\./, "")),
	scrollMargin: parseCount,
	tagDocsBaseUrl: parseText,
	logLevel: parseLogLevel,
	logFile: parseText,
};

export interface SettingsResult {
	settings: AppSettings;
	/** Environment variables that were set but could not be used. */
	rejected: string[];
}

function applyEnv<K extends keyof AppSettings>(
	settings: AppSettings,
	key: K,
	env: Record<string, string | undefined>,
	rejected: string[],
): void {
	const name = envKeyMap[key];
	const raw = env[name];
	if (raw === undefined) return;

	const parsed = parsers[key](raw);
	if (parsed === null) {
		rejected.push(name);
		return;
	}
	settings[key] = parsed;
}

export function loadSettings(
	env: Record<string, string | undefined> = process.env,
	home: string = homedir(),
): SettingsResult {
	const settings = defaultSettings(home);
	const rejected: string[] = [];
	for (const key of Object.keys(envKeyMap)) {
		if (isSettingKey(key)) {
			applyEnv(settings, key, env, rejected);
		}
	}
	return { settings, rejected };
}

function isSettingKey(key: string): key is keyof AppSettings {
	return key in envKeyMap;
}
