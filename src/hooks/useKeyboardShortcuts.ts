import { type Key, useInput } from "ink";
import { useRef } from "react";

export type NamedKey =
	| "up"
	| "down"
	| "left"
	| "right"
	| "pageup"
	| "pagedown"
	| "return"
	| "escape"
	| "tab"
	| "backspace";

export interface KeyboardShortcut {
	/** A named key, or the character typed (case-sensitive). */
	key: NamedKey | string;
	/** Only checked for named keys; characters carry their own case. */
	shift?: boolean;
	when?: () => boolean;
	handler: () => void;
	description?: string;
}

export interface KeyboardShortcutOptions {
	/** Receives printable input no shortcut claimed (text entry modes). */
	onText?: (text: string) => void;
	isActive?: boolean;
	/** Runs before every key press is dispatched. */
	onKeyPress?: () => void;
}

/** The parts of ink's key state that shortcut matching reads. */
export type KeyState = Pick<
	Key,
	| "upArrow"
	| "downArrow"
	| "leftArrow"
	| "rightArrow"
	| "pageUp"
	| "pageDown"
	| "return"
	| "escape"
	| "tab"
	| "backspace"
	| "delete"
	| "ctrl"
	| "meta"
	| "shift"
>;

export function keyName(key: KeyState): NamedKey | null {
	if (key.upArrow) return "up";
	if (key.downArrow) return "down";
	if (key.leftArrow) return "left";
	if (key.rightArrow) return "right";
	if (key.pageUp) return "pageup";
	if (key.pageDown) return "pagedown";
	if (key.return) return "return";
	if (key.escape) return "escape";
	if (key.tab) return "tab";
	if (key.backspace || key.delete) return "backspace";
	return null;
}

/**
 * Find the shortcut for a key press. Named keys match on name and shift
 * state; anything else matches on the exact character.
 */
export function matchShortcut(
	input: string,
	key: KeyState,
	shortcuts: KeyboardShortcut[],
): KeyboardShortcut | null {
	const named = keyName(key);
	for (const shortcut of shortcuts) {
		if (shortcut.when && !shortcut.when()) continue;

		const matches = named
			? shortcut.key === named && Boolean(shortcut.shift) === key.shift
			: !key.ctrl && !key.meta && shortcut.key === input;
		if (matches) return shortcut;
	}
	return null;
}

export function isPrintable(input: string, key: KeyState): boolean {
	return (
		input !== "" &&
		keyName(key) === null &&
		!key.ctrl &&
		!key.meta &&
		!/[\u0000-\u001f\u007f]/.test(input)
	);
}

export function useKeyboardShortcuts(
	shortcuts: KeyboardShortcut[],
	options: KeyboardShortcutOptions = {},
) {
	const shortcutsRef = useRef(shortcuts);
	shortcutsRef.current = shortcuts;
	const optionsRef = useRef(options);
	optionsRef.current = options;

	useInput(
		(input, key) => {
			optionsRef.current.onKeyPress?.();

			const shortcut = matchShortcut(input, key, shortcutsRef.current);
			if (shortcut) {
				shortcut.handler();
				return;
			}

			const { onText } = optionsRef.current;
			if (onText && isPrintable(input, key)) {
				onText(input);
			}
		},
		{ isActive: options.isActive ?? true },
	);
}
