/**
 * Key bindings for every screen and input mode
 */

import { useApp } from "ink";
import { createLogger } from "@/lib/logger";
import { useSaveDialogStore } from "@/stores/saveDialogStore";
import { useSessionStore } from "@/stores/sessionStore";
import {
	type KeyboardShortcut,
	type KeyboardShortcutOptions,
	useKeyboardShortcuts,
} from "./useKeyboardShortcuts";

const log = createLogger("Shortcuts");

/** Rows moved by space and page keys. */
export const PAGE_STEP = 4;

const session = () => useSessionStore.getState();
const saveDialog = () => useSaveDialogStore.getState();

export function mainShortcuts(quit: () => void): KeyboardShortcut[] {
	return [
		{ key: " ", handler: () => session().dragCursor(PAGE_STEP) },
		{ key: "pagedown", handler: () => session().dragCursor(PAGE_STEP) },
		{ key: "pageup", handler: () => session().dragCursor(-PAGE_STEP) },
		{ key: "q", handler: quit },
		{ key: "s", handler: () => session().toggleShortNames() },
		{ key: "n", handler: () => session().toggleNumerical() },
		{ key: "f", handler: () => session().beginFilter() },
		{ key: "w", handler: () => void session().openTagDocs() },
		{ key: "h", handler: () => session().setScreen("help") },
		{ key: "up", handler: () => session().moveCursor(-1) },
		{ key: "down", handler: () => session().moveCursor(1) },
		{ key: "left", handler: () => session().scrollHorizontal(-1) },
		{ key: "right", handler: () => session().scrollHorizontal(1) },
		{ key: "return", handler: () => session().toggleDetails() },
		{
			key: "escape",
			when: () => session().showDetails,
			handler: () => session().closeDetails(),
		},
		{ key: "x", handler: () => void session().copySelected("value") },
		{ key: "X", handler: () => void session().copySelected("numeric") },
		{ key: "C", handler: () => void session().copySelected("entry") },
		{ key: "b", handler: () => saveDialog().open() },
		{ key: "F", handler: () => session().applyFamilyFilter() },
		{
			key: "tab",
			when: () => session().isMultipleFiles(),
			handler: () => session().nextFile(),
		},
		{
			key: "tab",
			shift: true,
			when: () => session().isMultipleFiles(),
			handler: () => session().prevFile(),
		},
		{
			key: "W",
			when: () => session().isMultipleFiles() && !session().compare.enabled,
			handler: () => session().removeActiveFile(),
		},
		{ key: "c", handler: () => session().toggleCompare() },
		{
			key: "d",
			when: () => session().compare.enabled,
			handler: () => session().toggleOnlyDiff(),
		},
	];
}

export const filterShortcuts: KeyboardShortcut[] = [
	{ key: "backspace", handler: () => session().deleteFilterChar() },
	{ key: "return", handler: () => session().applyFilter() },
	{ key: "escape", handler: () => session().discardFilter() },
];

export const saveDialogShortcuts: KeyboardShortcut[] = [
	{ key: "backspace", handler: () => saveDialog().deleteChar() },
	{ key: "tab", handler: () => saveDialog().toggleField() },
	{ key: "return", handler: () => void saveDialog().submit() },
	{ key: "escape", handler: () => saveDialog().close() },
];

export const helpShortcuts: KeyboardShortcut[] = [
	{ key: "escape", handler: () => session().setScreen("main") },
	{ key: "return", handler: () => session().setScreen("main") },
	{ key: "q", handler: () => session().setScreen("main") },
];

export function recursionShortcuts(
	quit: (error?: Error) => void,
): KeyboardShortcut[] {
	const read = (recursive: boolean) => () => {
		session()
			.readFiles(recursive)
			.catch((error: unknown) => {
				log.error("Reading files failed:", error);
				quit(error instanceof Error ? error : new Error(String(error)));
			});
	};
	return [
		{ key: "q", handler: () => quit() },
		{ key: "y", handler: read(true) },
		{ key: "return", handler: read(true) },
		{ key: "n", handler: read(false) },
		{ key: "escape", handler: read(false) },
	];
}

export function useAppShortcuts() {
	const { exit } = useApp();
	const screen = useSessionStore((s) => s.screen);
	const input = useSessionStore((s) => s.input);
	const loading = useSessionStore((s) => s.loading);

	let shortcuts: KeyboardShortcut[] = [];
	let options: KeyboardShortcutOptions = {};

	switch (screen) {
		case "help":
			shortcuts = helpShortcuts;
			break;
		case "recursionPrompt":
			shortcuts = recursionShortcuts(exit);
			options = { isActive: !loading };
			break;
		case "main":
			switch (input) {
				case "main":
					shortcuts = mainShortcuts(() => exit());
					options = { onKeyPress: () => session().consumeStatus() };
					break;
				case "filter":
					shortcuts = filterShortcuts;
					options = { onText: (text) => session().appendFilter(text) };
					break;
				case "binarySaveDialog":
					shortcuts = saveDialogShortcuts;
					options = { onText: (text) => saveDialog().typeText(text) };
					break;
			}
			break;
	}

	useKeyboardShortcuts(shortcuts, options);
}
