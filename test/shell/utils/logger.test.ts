import { describe, expect, it, vi } from "vitest";

import {
	createConsoleLogger,
	isDebugEnabled,
	silentLogger,
} from "../../../src/shell/utils/logger.js";

describe("isDebugEnabled", () => {
	it("is enabled only by PYLINT_DIAGNOSTICS_DEBUG=1", () => {
		expect(isDebugEnabled({ PYLINT_DIAGNOSTICS_DEBUG: "1" })).toBe(true);
		expect(isDebugEnabled({ PYLINT_DIAGNOSTICS_DEBUG: "true" })).toBe(false);
		expect(isDebugEnabled({})).toBe(false);
	});
});

describe("createConsoleLogger", () => {
	it("writes debug lines to stderr with a prefix when enabled", () => {
		const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);

		createConsoleLogger({ debug: true }).debug("cache hit");

		expect(spy).toHaveBeenCalledWith("[pylint-diagnostics]", "cache hit");
	});

	it("drops debug lines when disabled but keeps errors", () => {
		const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
		const logger = createConsoleLogger({ debug: false });

		logger.debug("cache hit");
		logger.error("pylint failed");

		expect(spy).toHaveBeenCalledTimes(1);
		expect(spy).toHaveBeenCalledWith("❌ pylint failed");
	});

	it("never writes to stdout", () => {
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
		vi.spyOn(console, "error").mockImplementation(() => undefined);
		const logger = createConsoleLogger({ debug: true });

		logger.debug("a");
		logger.info("b");
		logger.error("c");
		silentLogger.info("d");

		expect(log).not.toHaveBeenCalled();
	});
});
