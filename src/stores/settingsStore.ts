/**
 * Settings store for runtime configuration
 * Values come from the environment at startup and live for the session only
 */

import { create } from "zustand";
import { type AppSettings, defaultSettings, loadSettings } from "@/lib/config";
import { configureLogging, createLogger } from "@/lib/logger";

const log = createLogger("SettingsStore");

interface SettingsState {
	settings: AppSettings;
	initialized: boolean;

	// Actions
	initialize: (env?: Record<string, string | undefined>) => void;
	updateSettings: (updates: Partial<AppSettings>) => void;
	resetSettings: () => void;
}

export const useSettingsStore = create<SettingsState>((set, get) => ({
	settings: defaultSettings(),
	initialized: false,

	initialize: (env = process.env) => {
		const { settings, rejected } = loadSettings(env);
		configureLogging(settings);
		for (const name of rejected) {
			log.warn(`Ignoring invalid value of ${name}`);
		}
		set({ settings, initialized: true });
		log.debug("Settings initialized:", settings);
	},

	updateSettings: (updates) => {
		const settings = { ...get().settings, ...updates };
		configureLogging(settings);
		set({ settings });
	},

	resetSettings: () => {
		const settings = defaultSettings();
		configureLogging(settings);
		set({ settings, initialized: false });
	},
}));
