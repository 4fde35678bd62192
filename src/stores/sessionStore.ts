/**
 * Session store: loaded files, comparison table, filter, display modes and the
 * cursor/scroll state of the tag list.
 *
 * Every action that can change what is listed reconciles the viewport against
 * a freshly computed view before the state is published, so readers never see
 * a cursor outside the visible rows.
 */

import clipboard from "clipboardy";
import open from "open";
import { create } from "zustand";
import { buildCompareRows } from "@/lib/compareIndex";
import { runExiftool } from "@/lib/exiftool";
import { hasSubdirectories, isDirectory } from "@/lib/fileUtils";
import { createLogger } from "@/lib/logger";
import {
	familyFilterFor,
	numericOrValue,
	renderEntry,
	renderValue,
	tagDocsUrl,
} from "@/lib/tagEntry";
import {
	computeView,
	selectFromView,
	type TagView,
	type ViewInput,
	viewLength,
} from "@/lib/view";
import {
	cycleIndex,
	dragCursor,
	indexAfterRemoval,
	initialViewport,
	moveCursor,
	reconcileViewport,
	resetPosition,
	scrollHorizontal,
	type ViewportState,
} from "@/lib/viewport";
import type {
	CompareMode,
	CompareRow,
	DisplayMode,
	FileTagSet,
	TagEntry,
} from "@/types/metadata";
import { useSettingsStore } from "./settingsStore";

const log = createLogger("SessionStore");

export type Screen = "main" | "help" | "recursionPrompt";

export type InputMode = "main" | "filter" | "binarySaveDialog";

export type CopyTarget = "value" | "numeric" | "entry";

export interface StatusMessage {
	kind: "ok" | "error";
	text: string;
}

interface SessionData {
	screen: Screen;
	input: InputMode;
	files: FileTagSet[];
	compareRows: CompareRow[];
	/** Inputs waiting for the recursive/non-recursive choice. */
	pendingInputs: string[] | null;
	filter: string;
	display: DisplayMode;
	compare: CompareMode;
	showDetails: boolean;
	viewport: ViewportState;
	/** Rows the tag list can show at once; set by the renderer. */
	viewportHeight: number;
	loading: boolean;
	error: string | null;
	statusMessage: StatusMessage | null;
}

interface SessionState extends SessionData {
	// Loading
	load: (paths: string[]) => Promise<void>;
	readFiles: (recursive: boolean) => Promise<void>;
	setFiles: (files: FileTagSet[]) => void;
	reset: () => void;

	// Queries
	view: () => TagView;
	selectedEntry: () => TagEntry | null;
	activeFile: () => FileTagSet | null;
	isMultipleFiles: () => boolean;

	// Viewport
	setViewportHeight: (height: number) => void;
	moveCursor: (delta: number) => void;
	dragCursor: (delta: number) => void;
	scrollHorizontal: (delta: number) => void;
	nextFile: () => void;
	prevFile: () => void;
	removeActiveFile: () => void;

	// Filter
	beginFilter: () => void;
	appendFilter: (text: string) => void;
	deleteFilterChar: () => void;
	applyFilter: () => void;
	discardFilter: () => void;
	applyFamilyFilter: () => void;

	// Modes and screens
	toggleShortNames: () => void;
	toggleNumerical: () => void;
	toggleDetails: () => void;
	closeDetails: () => void;
	toggleCompare: () => void;
	toggleOnlyDiff: () => void;
	setScreen: (screen: Screen) => void;
	setInput: (input: InputMode) => void;

	// Status line
	setStatus: (message: StatusMessage | null) => void;
	consumeStatus: () => StatusMessage | null;

	// Selected entry
	copySelected: (target: CopyTarget) => Promise<void>;
	openTagDocs: () => Promise<void>;
}

export const initialSessionState: SessionData = {
	screen: "main",
	input: "main",
	files: [],
	compareRows: [],
	pendingInputs: null,
	filter: "",
	display: { short: false, numerical: false },
	compare: { enabled: false, onlyDiff: false },
	showDetails: false,
	viewport: initialViewport,
	viewportHeight: 1,
	loading: false,
	error: null,
	statusMessage: null,
};

function viewInput(state: SessionData): ViewInput {
	return {
		files: state.files,
		compareRows: state.compareRows,
		activeFileIndex: state.viewport.activeFileIndex,
		filter: state.filter,
		compare: state.compare,
	};
}

/**
 * Apply `patch` and reconcile the viewport with the view it produces. With
 * `resetPosition`, cursor and scroll offsets start over from zero.
 */
function withViewport(
	state: SessionData,
	patch: Partial<SessionData>,
	options: { resetPosition?: boolean } = {},
): Partial<SessionData> {
	const next = { ...state, ...patch };
	const viewport = options.resetPosition
		? resetPosition(next.viewport)
		: next.viewport;
	const rowCount = viewLength(computeView(viewInput(next)));
	return {
		...patch,
		viewport: reconcileViewport(
			viewport,
			rowCount,
			next.viewportHeight,
			useSettingsStore.getState().settings.scrollMargin,
		),
	};
}

const copyMessages: Record<CopyTarget, string> = {
	value: "Successfully copied value to clipboard",
	numeric: "Successfully copied numerical value to clipboard",
	entry: "Successfully copied entry data to clipboard",
};

function copyText(entry: TagEntry, target: CopyTarget): string {
	switch (target) {
		case "value":
			return renderValue(entry.value);
		case "numeric":
			return numericOrValue(entry);
		case "entry":
			return renderEntry(entry);
	}
}

export const useSessionStore = create<SessionState>((set, get) => ({
	...initialSessionState,

	load: async (paths) => {
		set({ pendingInputs: paths, error: null });
		const singleFile = paths.length === 1 && !(await isDirectory(paths[0]));
		if (!singleFile && (await hasSubdirectories(paths))) {
			log.info("Input contains subdirectories, asking about recursion");
			set({ screen: "recursionPrompt" });
			return;
		}
		await get().readFiles(false);
	},

	readFiles: async (recursive) => {
		const inputs = get().pendingInputs;
		if (!inputs) {
			log.warn("readFiles called without pending inputs");
			return;
		}

		set({ loading: true, error: null });
		try {
			const { settings } = useSettingsStore.getState();
			const files = await runExiftool(inputs, recursive, settings);
			get().setFiles(files);
			set({ pendingInputs: null, loading: false, screen: "main" });
		} catch (error) {
			log.error("Failed to read metadata:", error);
			set({
				loading: false,
				error: error instanceof Error ? error.message : String(error),
			});
			throw error;
		}
	},

	setFiles: (files) =>
		set((state) =>
			withViewport(
				state,
				{
					files,
					compareRows: buildCompareRows(files),
					compare:
						files.length > 1
							? state.compare
							: { enabled: false, onlyDiff: false },
					viewport: initialViewport,
				},
				{ resetPosition: true },
			),
		),

	reset: () => set(initialSessionState),

	view: () => computeView(viewInput(get())),

	selectedEntry: () => {
		const state = get();
		return selectFromView(
			computeView(viewInput(state)),
			state.viewport.cursor,
			state.viewport.activeFileIndex,
		);
	},

	activeFile: () => {
		const { files, viewport } = get();
		return files[viewport.activeFileIndex] ?? null;
	},

	isMultipleFiles: () => get().files.length > 1,

	setViewportHeight: (height) => {
		const viewportHeight = Math.max(1, Math.trunc(height));
		if (get().viewportHeight === viewportHeight) return;
		set((state) => withViewport(state, { viewportHeight }));
	},

	moveCursor: (delta) =>
		set((state) =>
			withViewport(state, {
				viewport: {
					...state.viewport,
					cursor: moveCursor(
						state.viewport.cursor,
						delta,
						state.viewport.visibleRowCount,
					),
				},
			}),
		),

	dragCursor: (delta) =>
		set((state) =>
			withViewport(state, { viewport: dragCursor(state.viewport, delta) }),
		),

	scrollHorizontal: (delta) =>
		set((state) => ({
			viewport: {
				...state.viewport,
				scrollHorizontal: scrollHorizontal(
					state.viewport.scrollHorizontal,
					delta,
				),
			},
		})),

	nextFile: () => {
		if (!get().isMultipleFiles()) return;
		set((state) =>
			withViewport(state, {
				viewport: {
					...state.viewport,
					activeFileIndex: cycleIndex(
						state.viewport.activeFileIndex,
						1,
						state.files.length,
					),
				},
			}),
		);
	},

	prevFile: () => {
		if (!get().isMultipleFiles()) return;
		set((state) =>
			withViewport(state, {
				viewport: {
					...state.viewport,
					activeFileIndex: cycleIndex(
						state.viewport.activeFileIndex,
						-1,
						state.files.length,
					),
				},
			}),
		);
	},

	removeActiveFile: () => {
		const { files, compare, viewport } = get();
		if (files.length <= 1 || compare.enabled) return;

		const removed = viewport.activeFileIndex;
		const remaining = files.filter((_, i) => i !== removed);
		log.info(`Removing ${files[removed].path} from the session`);
		set((state) =>
			withViewport(state, {
				files: remaining,
				compareRows: buildCompareRows(remaining),
				viewport: {
					...state.viewport,
					activeFileIndex: indexAfterRemoval(
						removed,
						removed,
						remaining.length,
					),
				},
			}),
		);
	},

	beginFilter: () =>
		set((state) =>
			withViewport(state, { input: "filter" }, { resetPosition: true }),
		),

	appendFilter: (text) =>
		set((state) => withViewport(state, { filter: state.filter + text })),

	deleteFilterChar: () =>
		set((state) =>
			withViewport(state, {
				filter: Array.from(state.filter).slice(0, -1).join(""),
			}),
		),

	applyFilter: () =>
		set((state) =>
			withViewport(state, { input: "main" }, { resetPosition: true }),
		),

	discardFilter: () =>
		set((state) =>
			withViewport(
				state,
				{ input: "main", filter: "" },
				{ resetPosition: true },
			),
		),

	applyFamilyFilter: () => {
		const entry = get().selectedEntry();
		if (!entry) return;
		set((state) =>
			withViewport(
				state,
				{ filter: familyFilterFor(entry) },
				{ resetPosition: true },
			),
		);
	},

	toggleShortNames: () =>
		set((state) => ({
			display: { ...state.display, short: !state.display.short },
		})),

	toggleNumerical: () =>
		set((state) => ({
			display: { ...state.display, numerical: !state.display.numerical },
		})),

	toggleDetails: () => set((state) => ({ showDetails: !state.showDetails })),

	closeDetails: () => set({ showDetails: false }),

	toggleCompare: () => {
		if (!get().isMultipleFiles()) {
			get().setStatus({
				kind: "error",
				text: "Compare mode needs more than one file",
			});
			return;
		}
		set((state) =>
			withViewport(
				state,
				{
					compare: { enabled: !state.compare.enabled, onlyDiff: false },
					viewport: { ...state.viewport, activeFileIndex: 0 },
				},
				{ resetPosition: true },
			),
		);
	},

	toggleOnlyDiff: () => {
		if (!get().compare.enabled) return;
		set((state) =>
			withViewport(
				state,
				{ compare: { ...state.compare, onlyDiff: !state.compare.onlyDiff } },
				{ resetPosition: true },
			),
		);
	},

	setScreen: (screen) => set({ screen }),

	setInput: (input) => set({ input }),

	setStatus: (message) => set({ statusMessage: message }),

	consumeStatus: () => {
		const message = get().statusMessage;
		if (message) set({ statusMessage: null });
		return message;
	},

	copySelected: async (target) => {
		const entry = get().selectedEntry();
		if (!entry) return;

		try {
			await clipboard.write(copyText(entry, target));
			get().setStatus({ kind: "ok", text: copyMessages[target] });
		} catch (error) {
			log.error("Failed to write clipboard:", error);
			get().setStatus({
				kind: "error",
				text: `Failed to copy to clipboard: ${error instanceof Error ? error.message : String(error)}`,
			});
		}
	},

	openTagDocs: async () => {
		const entry = get().selectedEntry();
		if (!entry) return;

		const { settings } = useSettingsStore.getState();
		const url = tagDocsUrl(entry, settings.tagDocsBaseUrl);
		try {
			log.debug(`Opening ${url}`);
			await open(url);
		} catch (error) {
			log.warn(`Failed to open ${url}:`, error);
			get().setStatus({ kind: "error", text: `Failed to open ${url}` });
		}
	},
}));
