import { afterEach, describe, expect, it, vi } from "vitest";
import { useSettingsStore } from "./settingsStore";

describe("settingsStore", () => {
	afterEach(() => {
		useSettingsStore.getState().resetSettings();
		vi.restoreAllMocks();
	});

	it("loads settings from the environment", () => {
		useSettingsStore.getState().initialize({
			TAGSCOPE_DEFAULT_EXTENSION: "png",
			TAGSCOPE_SCROLL_MARGIN: "2",
		});
		const { settings, initialized } = useSettingsStore.getState();
		expect(initialized).toBe(true);
		expect(settings.defaultExtension).toBe("png");
		expect(settings.scrollMargin).toBe(2);
	});

	it("warns about values it cannot use", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		useSettingsStore.getState().initialize({ TAGSCOPE_SCROLL_MARGIN: "many" });
		expect(warn).toHaveBeenCalledWith(
			"[SettingsStore]",
			"Ignoring invalid value of TAGSCOPE_SCROLL_MARGIN",
		);
		expect(useSettingsStore.getState().settings.scrollMargin).toBe(5);
	});
});
