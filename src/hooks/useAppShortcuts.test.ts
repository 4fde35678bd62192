import { beforeEach, describe, expect, it, vi } from "vitest";
import { makeEntry, makeFile } from "@/test/entries";
import { useSaveDialogStore } from "@/stores/saveDialogStore";
import { initialSessionState, useSessionStore } from "@/stores/sessionStore";
import {
	filterShortcuts,
	mainShortcuts,
	recursionShortcuts,
	saveDialogShortcuts,
} from "./useAppShortcuts";
import {
	type KeyboardShortcut,
	type KeyState,
	matchShortcut,
} from "./useKeyboardShortcuts";

const noKey: KeyState = {
	upArrow: false,
	downArrow: false,
	leftArrow: false,
	rightArrow: false,
	pageUp: false,
	pageDown: false,
	return: false,
	escape: false,
	tab: false,
	backspace: false,
	delete: false,
	ctrl: false,
	meta: false,
	shift: false,
};

function press(
	shortcuts: KeyboardShortcut[],
	input: string,
	state: Partial<KeyState> = {},
): boolean {
	const shortcut = matchShortcut(input, { ...noKey, ...state }, shortcuts);
	shortcut?.handler();
	return shortcut !== null;
}

const session = () => useSessionStore.getState();

const files = [
	makeFile("a.jpg", [
		makeEntry("Make", "Canon"),
		makeEntry("Model", "EOS R5"),
		makeEntry("Software", "1.0"),
	]),
	makeFile("b.jpg", [makeEntry("Make", "Canon")]),
];

beforeEach(() => {
	useSessionStore.setState(initialSessionState);
	useSaveDialogStore.getState().close();
	session().setFiles(files);
});

describe("main shortcuts", () => {
	const quit = vi.fn();
	const shortcuts = mainShortcuts(quit);

	it("moves the cursor with the arrows", () => {
		press(shortcuts, "", { downArrow: true });
		press(shortcuts, "", { downArrow: true });
		press(shortcuts, "", { upArrow: true });
		expect(session().viewport.cursor).toBe(1);
	});

	it("pages with space", () => {
		press(shortcuts, " ");
		expect(session().viewport.cursor).toBe(2);
	});

	it("cycles files with tab and shift-tab", () => {
		press(shortcuts, "", { tab: true });
		expect(session().viewport.activeFileIndex).toBe(1);
		press(shortcuts, "", { tab: true, shift: true });
		expect(session().viewport.activeFileIndex).toBe(0);
	});

	it("toggles compare and the diff filter", () => {
		expect(press(shortcuts, "d")).toBe(false);
		press(shortcuts, "c");
		expect(session().compare.enabled).toBe(true);
		press(shortcuts, "d");
		expect(session().compare.onlyDiff).toBe(true);
	});

	it("closes details with escape only when they are open", () => {
		expect(press(shortcuts, "", { escape: true })).toBe(false);
		press(shortcuts, "", { return: true });
		expect(session().showDetails).toBe(true);
		press(shortcuts, "", { escape: true });
		expect(session().showDetails).toBe(false);
	});

	it("starts filtering and quits", () => {
		press(shortcuts, "f");
		expect(session().input).toBe("filter");
		press(shortcuts, "q");
		expect(quit).toHaveBeenCalledTimes(1);
	});

	it("refuses the save dialog for text tags", () => {
		press(shortcuts, "b");
		expect(useSaveDialogStore.getState().visible).toBe(false);
		expect(session().statusMessage?.text).toBe(
			"Selected entry does not contain any binary data!",
		);
	});
});

describe("filter shortcuts", () => {
	it("applies with enter and discards with escape", () => {
		session().beginFilter();
		session().appendFilter("ab");
		press(filterShortcuts, "", { backspace: true });
		expect(session().filter).toBe("a");
		press(filterShortcuts, "", { return: true });
		expect(session().input).toBe("main");
		expect(session().filter).toBe("a");

		session().beginFilter();
		press(filterShortcuts, "", { escape: true });
		expect(session().filter).toBe("");
	});

	it("leaves characters to text entry", () => {
		expect(press(filterShortcuts, "q")).toBe(false);
	});
});

describe("save dialog shortcuts", () => {
	it("switches fields with tab", () => {
		press(saveDialogShortcuts, "", { tab: true });
		expect(useSaveDialogStore.getState().editingName).toBe(false);
	});
});

describe("recursion shortcuts", () => {
	it("quits on q", () => {
		const quit = vi.fn();
		press(recursionShortcuts(quit), "q");
		expect(quit).toHaveBeenCalledWith();
	});
});
