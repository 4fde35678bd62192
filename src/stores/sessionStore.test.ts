import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { makeEntry, makeFile } from "@/test/entries";

const mocks = vi.hoisted(() => ({
	clipboardWrite: vi.fn(),
	open: vi.fn(),
	runExiftool: vi.fn(),
}));

vi.mock("clipboardy", () => ({ default: { write: mocks.clipboardWrite } }));
vi.mock("open", () => ({ default: mocks.open }));
vi.mock("../lib/exiftool", () => ({ runExiftool: mocks.runExiftool }));

import { initialSessionState, useSessionStore } from "./sessionStore";
import { useSettingsStore } from "./settingsStore";

const session = () => useSessionStore.getState();

const r5 = makeFile("one.jpg", [
	makeEntry("Make", "Canon"),
	makeEntry("Model", "EOS R5"),
	makeEntry("LensModel", "RF 24-70mm"),
]);
const r6 = makeFile("two.jpg", [
	makeEntry("Make", "Canon"),
	makeEntry("Model", "EOS R6"),
]);

beforeEach(() => {
	useSessionStore.setState(initialSessionState);
	useSettingsStore.getState().resetSettings();
	vi.clearAllMocks();
});

describe("setFiles", () => {
	it("builds the compare table and starts at the top", () => {
		session().setFiles([r5, r6]);
		expect(session().compareRows).toHaveLength(3);
		expect(session().viewport.cursor).toBe(0);
		expect(session().viewport.visibleRowCount).toBe(3);
		expect(session().selectedEntry()?.shortName).toBe("Make");
		expect(session().isMultipleFiles()).toBe(true);
	});

	it("turns compare mode off for a single file", () => {
		session().setFiles([r5, r6]);
		session().toggleCompare();
		session().setFiles([r5]);
		expect(session().compare).toEqual({ enabled: false, onlyDiff: false });
	});
});

describe("viewport", () => {
	const many = makeFile(
		"many.jpg",
		Array.from({ length: 50 }, (_, i) => makeEntry(`Tag${i}`, `v${i}`)),
	);

	it("scrolls the cursor into view", () => {
		session().setViewportHeight(10);
		session().setFiles([many]);
		session().moveCursor(49);
		expect(session().viewport.cursor).toBe(49);
		expect(session().viewport.scrollVertical).toBe(40);
		expect(session().selectedEntry()?.shortName).toBe("Tag49");
	});

	it("keeps the cursor at the bounds", () => {
		session().setFiles([many]);
		session().moveCursor(-3);
		expect(session().viewport.cursor).toBe(0);
		session().moveCursor(500);
		expect(session().viewport.cursor).toBe(49);
	});

	it("pages with drag", () => {
		session().setViewportHeight(10);
		session().setFiles([many]);
		session().dragCursor(4);
		expect(session().viewport.cursor).toBe(4);
		expect(session().viewport.scrollVertical).toBe(4);
	});
});

describe("compare mode", () => {
	it("selects the active file's slot", () => {
		session().setFiles([r5, r6]);
		session().toggleCompare();
		session().moveCursor(2);
		expect(session().selectedEntry()?.shortName).toBe("LensModel");

		session().nextFile();
		expect(session().viewport.activeFileIndex).toBe(1);
		expect(session().selectedEntry()).toBeNull();
	});

	it("needs more than one file", () => {
		session().setFiles([r5]);
		session().toggleCompare();
		expect(session().compare.enabled).toBe(false);
		expect(session().statusMessage).toEqual({
			kind: "error",
			text: "Compare mode needs more than one file",
		});
	});

	it("lists differing rows only", () => {
		session().setFiles([r5, r6]);
		session().toggleCompare();
		session().toggleOnlyDiff();
		const view = session().view();
		expect(
			view.mode === "compare" && view.rows.map((r) => r.representative.shortName),
		).toEqual(["Model", "LensModel"]);
	});
});

describe("removeActiveFile", () => {
	const files = [
		makeFile("a.jpg", [makeEntry("Make", "A")]),
		makeFile("b.jpg", [makeEntry("Make", "B")]),
		makeFile("c.jpg", [makeEntry("Make", "C")]),
	];

	it("drops the file and moves to the previous one", () => {
		session().setFiles(files);
		session().nextFile();
		session().nextFile();
		session().removeActiveFile();
		expect(session().files.map((f) => f.path)).toEqual(["a.jpg", "b.jpg"]);
		expect(session().viewport.activeFileIndex).toBe(1);
		expect(session().compareRows[0].perFile).toHaveLength(2);
	});

	it("is disabled in compare mode", () => {
		session().setFiles(files);
		session().toggleCompare();
		session().removeActiveFile();
		expect(session().files).toHaveLength(3);
	});

	it("keeps the last file", () => {
		session().setFiles([files[0]]);
		session().removeActiveFile();
		expect(session().files).toHaveLength(1);
	});
});

describe("filter", () => {
	it("edits, applies and discards", () => {
		session().setFiles([r5, r6]);
		session().moveCursor(2);
		session().beginFilter();
		expect(session().input).toBe("filter");
		expect(session().viewport.cursor).toBe(0);

		session().appendFilter("model");
		expect(session().viewport.visibleRowCount).toBe(2);
		session().deleteFilterChar();
		expect(session().filter).toBe("mode");

		session().applyFilter();
		expect(session().input).toBe("main");
		expect(session().filter).toBe("mode");

		session().discardFilter();
		expect(session().filter).toBe("");
		expect(session().viewport.visibleRowCount).toBe(3);
	});

	it("clamps the cursor when the filter shrinks the view", () => {
		session().setFiles([r5]);
		session().moveCursor(2);
		session().appendFilter("lens");
		expect(session().viewport.cursor).toBe(0);
		expect(session().selectedEntry()?.shortName).toBe("LensModel");
	});

	it("filters by the selected entry's family", () => {
		session().setFiles([
			makeFile("gps.jpg", [
				makeEntry("Make", "Canon"),
				makeEntry("GPSLatitude", "51.5", { table: ["GPS", "Main"] }),
			]),
		]);
		session().moveCursor(1);
		session().applyFamilyFilter();
		expect(session().filter).toBe("<<GPS::Main>>");
		expect(session().viewport.visibleRowCount).toBe(1);
		expect(session().selectedEntry()?.shortName).toBe("GPSLatitude");
	});
});

describe("display toggles", () => {
	it("flips each mode independently", () => {
		session().toggleShortNames();
		expect(session().display).toEqual({ short: true, numerical: false });
		session().toggleNumerical();
		session().toggleShortNames();
		expect(session().display).toEqual({ short: false, numerical: true });
	});

	it("opens and closes details", () => {
		session().toggleDetails();
		expect(session().showDetails).toBe(true);
		session().closeDetails();
		expect(session().showDetails).toBe(false);
	});
});

describe("status", () => {
	it("is consumed once", () => {
		session().setStatus({ kind: "ok", text: "done" });
		expect(session().consumeStatus()).toEqual({ kind: "ok", text: "done" });
		expect(session().consumeStatus()).toBeNull();
	});
});

describe("selected entry actions", () => {
	it("copies the value", async () => {
		mocks.clipboardWrite.mockResolvedValue(undefined);
		session().setFiles([r5]);
		await session().copySelected("value");
		expect(mocks.clipboardWrite).toHaveBeenCalledWith("Canon");
		expect(session().statusMessage).toEqual({
			kind: "ok",
			text: "Successfully copied value to clipboard",
		});
	});

	it("reports clipboard failures", async () => {
		mocks.clipboardWrite.mockRejectedValue(new Error("no display"));
		session().setFiles([r5]);
		await session().copySelected("entry");
		expect(session().statusMessage).toEqual({
			kind: "error",
			text: "Failed to copy to clipboard: no display",
		});
	});

	it("does nothing without a selection", async () => {
		await session().copySelected("value");
		expect(mocks.clipboardWrite).not.toHaveBeenCalled();
	});

	it("opens the family documentation", async () => {
		mocks.open.mockResolvedValue(undefined);
		session().setFiles([r5]);
		await session().openTagDocs();
		expect(mocks.open).toHaveBeenCalledWith(
			"https://exiftool.org/TagNames/EXIF.html",
		);
	});
});

describe("load", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), "tagscope-session-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("reads a single file directly", async () => {
		const file = join(dir, "a.jpg");
		await writeFile(file, "");
		mocks.runExiftool.mockResolvedValue([r5]);

		await session().load([file]);
		expect(mocks.runExiftool).toHaveBeenCalledWith(
			[file],
			false,
			useSettingsStore.getState().settings,
		);
		expect(session().files).toEqual([r5]);
		expect(session().screen).toBe("main");
		expect(session().pendingInputs).toBeNull();
	});

	it("asks before reading nested directories", async () => {
		await mkdir(join(dir, "nested"));
		mocks.runExiftool.mockResolvedValue([r5, r6]);

		await session().load([dir]);
		expect(session().screen).toBe("recursionPrompt");
		expect(mocks.runExiftool).not.toHaveBeenCalled();

		await session().readFiles(true);
		expect(mocks.runExiftool.mock.calls[0][0]).toEqual([dir]);
		expect(mocks.runExiftool.mock.calls[0][1]).toBe(true);
		expect(session().screen).toBe("main");
		expect(session().files).toHaveLength(2);
	});

	it("records and rethrows extraction errors", async () => {
		const file = join(dir, "a.jpg");
		await writeFile(file, "");
		mocks.runExiftool.mockRejectedValue(new Error("exiftool missing"));

		await expect(session().load([file])).rejects.toThrow("exiftool missing");
		expect(session().error).toBe("exiftool missing");
		expect(session().loading).toBe(false);
	});
});
