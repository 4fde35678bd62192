import { render } from "ink";
import { parseArgs } from "node:util";
import App from "./App";
import { createLogger } from "./lib/logger";
import { useSessionStore } from "./stores/sessionStore";
import { useSettingsStore } from "./stores/settingsStore";

const log = createLogger("Main");

const USAGE = `Usage: tagscope [options] <file or directory>...

Browse exiftool metadata of one or more files in the terminal.

Options:
  -h, --help    Show this message

Environment:
  TAGSCOPE_EXIFTOOL           exiftool executable (default: exiftool)
  TAGSCOPE_DOWNLOAD_DIR       directory for extracted binary data
  TAGSCOPE_DEFAULT_EXTENSION  extension suggested when saving binary data
  TAGSCOPE_SCROLL_MARGIN      rows kept between cursor and list edge
  TAGSCOPE_TAG_DOCS_URL       base URL of the tag documentation
  TAGSCOPE_LOG_LEVEL          debug, info, warn, error or silent
  TAGSCOPE_LOG_FILE           write log output to this file
`;

async function main(argv: string[]): Promise<number> {
	let parsed: ReturnType<typeof parseCommandLine>;
	try {
		parsed = parseCommandLine(argv);
	} catch (error) {
		process.stderr.write(
			`${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`,
		);
		return 2;
	}

	if (parsed.help) {
		process.stdout.write(USAGE);
		return 0;
	}
	if (parsed.paths.length === 0) {
		process.stderr.write(USAGE);
		return 2;
	}

	useSettingsStore.getState().initialize();

	try {
		await useSessionStore.getState().load(parsed.paths);
	} catch (error) {
		process.stderr.write(
			`${error instanceof Error ? error.message : String(error)}\n`,
		);
		return 1;
	}

	const app = render(<App />);
	try {
		await app.waitUntilExit();
	} catch (error) {
		log.error("Exited with error:", error);
		process.stderr.write(
			`${error instanceof Error ? error.message : String(error)}\n`,
		);
		return 1;
	}
	return 0;
}

function parseCommandLine(argv: string[]): { help: boolean; paths: string[] } {
	const { values, positionals } = parseArgs({
		args: argv,
		options: { help: { type: "boolean", short: "h" } },
		allowPositionals: true,
	});
	return { help: values.help ?? false, paths: positionals };
}

main(process.argv.slice(2)).then(
	(code) => {
		process.exitCode = code;
	},
	(error: unknown) => {
		log.error("Unexpected failure:", error);
		process.exitCode = 1;
	},
);
