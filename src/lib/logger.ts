import { Console as FileConsole } from "node:console";
import { createWriteStream } from "node:fs";
import type { AppSettings, LogLevel } from "./config";

type WritableLevel = Exclude<LogLevel, "silent">;

const severity: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: Number.POSITIVE_INFINITY,
};

let threshold = severity.warn;
let sink: Console = console;

/**
 * Route log output. With a log file configured, lines are appended there so
 * they do not interleave with the terminal UI.
 */
export function configureLogging(
	settings: Pick<AppSettings, "logLevel" | "logFile">,
): void {
	threshold = severity[settings.logLevel];
	sink =
		settings.logFile === ""
			? console
			: new FileConsole({
					stdout: createWriteStream(settings.logFile, { flags: "a" }),
				});
}

export interface Logger {
	debug: (...args: unknown[]) => void;
	info: (...args: unknown[]) => void;
	warn: (...args: unknown[]) => void;
	error: (...args: unknown[]) => void;
}

export function createLogger(scope: string): Logger {
	const prefix = `[${scope}]`;
	const write =
		(level: WritableLevel) =>
		(...args: unknown[]) => {
			if (severity[level] < threshold) return;
			sink[level](prefix, ...args);
		};

	return {
		debug: write("debug"),
		info: write("info"),
		warn: write("warn"),
		error: write("error"),
	};
}
