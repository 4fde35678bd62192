import { afterEach, describe, expect, it, vi } from "vitest";
import { configureLogging, createLogger } from "./logger";

describe("createLogger", () => {
	afterEach(() => {
		configureLogging({ logLevel: "warn", logFile: "" });
		vi.restoreAllMocks();
	});

	it("prefixes messages with the scope", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		createLogger("Session").warn("careful", 3);
		expect(warn).toHaveBeenCalledWith("[Session]", "careful", 3);
	});

	it("drops messages below the configured level", () => {
		const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		const log = createLogger("Test");

		log.debug("hidden");
		log.error("shown");
		expect(debug).not.toHaveBeenCalled();
		expect(error).toHaveBeenCalledTimes(1);

		configureLogging({ logLevel: "debug", logFile: "" });
		log.debug("now visible");
		expect(debug).toHaveBeenCalledWith("[Test]", "now visible");
	});

	it("stays quiet when silenced", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		configureLogging({ logLevel: "silent", logFile: "" });
		createLogger("Test").error("nothing");
		expect(error).not.toHaveBeenCalled();
	});
});
