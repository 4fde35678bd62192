/**
 * Binary export dialog
 * Collects a file name and extension, then writes the selected tag's payload
 * into the configured download location
 */

import { create } from "zustand";
import { resolveSaveTarget, writeBinaryFile } from "@/lib/binarySave";
import { extractBinary } from "@/lib/exiftool";
import { createLogger } from "@/lib/logger";
import { type StatusMessage, useSessionStore } from "./sessionStore";
import { useSettingsStore } from "./settingsStore";

const log = createLogger("SaveDialog");

interface SaveDialogState {
	visible: boolean;
	name: string;
	extension: string;
	editingName: boolean;
	saving: boolean;
	status: StatusMessage;

	// Actions
	open: () => boolean;
	close: () => void;
	typeText: (text: string) => void;
	deleteChar: () => void;
	toggleField: () => void;
	submit: () => Promise<boolean>;
}

const hiddenState: Omit<
	SaveDialogState,
	"open" | "close" | "typeText" | "deleteChar" | "toggleField" | "submit"
> = {
	visible: false,
	name: "",
	extension: "",
	editingName: true,
	saving: false,
	status: { kind: "ok", text: "" },
};

function errorText(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export const useSaveDialogStore = create<SaveDialogState>((set, get) => ({
	...hiddenState,

	open: () => {
		const session = useSessionStore.getState();
		const entry = session.selectedEntry();
		if (entry?.binarySizeKb === undefined) {
			session.setStatus({
				kind: "error",
				text: "Selected entry does not contain any binary data!",
			});
			return false;
		}

		const { settings } = useSettingsStore.getState();
		set({
			...hiddenState,
			visible: true,
			extension: settings.defaultExtension,
			status: {
				kind: "ok",
				text: `File will be saved in ${settings.downloadLocation}. You probably want a .${settings.defaultExtension}.`,
			},
		});
		session.setInput("binarySaveDialog");
		return true;
	},

	close: () => {
		set(hiddenState);
		useSessionStore.getState().setInput("main");
	},

	typeText: (text) =>
		set((state) =>
			state.editingName
				? { name: state.name + text }
				: { extension: state.extension + text },
		),

	deleteChar: () =>
		set((state) =>
			state.editingName
				? { name: Array.from(state.name).slice(0, -1).join("") }
				: { extension: Array.from(state.extension).slice(0, -1).join("") },
		),

	toggleField: () => set((state) => ({ editingName: !state.editingName })),

	submit: async () => {
		const { name, extension, saving } = get();
		if (saving) return false;

		const session = useSessionStore.getState();
		const { settings } = useSettingsStore.getState();
		const entry = session.selectedEntry();
		const file = session.activeFile();
		if (!entry || !file) {
			set({ status: { kind: "error", text: "No entry selected." } });
			return false;
		}

		set({ saving: true });
		try {
			const target = await resolveSaveTarget(settings.downloadLocation, {
				name,
				extension,
			});
			if (!target.ok) {
				set({ saving: false, status: { kind: "error", text: target.error } });
				return false;
			}

			const data = await extractBinary(file.path, entry, settings);
			await writeBinaryFile(target.path, data);
			log.info(
				`Saved ${data.length} bytes of ${entry.shortName} to ${target.path}`,
			);

			get().close();
			session.setStatus({
				kind: "ok",
				text: `Successfully saved at ${target.path}`,
			});
			return true;
		} catch (error) {
			log.error("Failed to save binary data:", error);
			set({
				saving: false,
				status: { kind: "error", text: `Failed to save: ${errorText(error)}` },
			});
			return false;
		}
	},
}));
