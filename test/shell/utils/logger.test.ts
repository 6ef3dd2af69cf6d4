// CHANGE: Specs for the console logger's debug gate
// WHY: Debug output must stay silent unless CRAFT_LINT_DEBUG=1

import { describe, expect, it, vi } from "vitest";

import {
	createConsoleLogger,
	createMemoryLogger,
	isDebugEnabled,
} from "../../../src/shell/utils/logger.js";

describe("isDebugEnabled", () => {
	it("reads CRAFT_LINT_DEBUG", () => {
		expect(isDebugEnabled({ CRAFT_LINT_DEBUG: "1" })).toBe(true);
		expect(isDebugEnabled({ CRAFT_LINT_DEBUG: "0" })).toBe(false);
		expect(isDebugEnabled({})).toBe(false);
	});
});

describe("createConsoleLogger", () => {
	it("writes debug lines to stderr only when enabled", () => {
		const stderr = vi.spyOn(console, "error").mockImplementation(() => undefined);
		createConsoleLogger(false).debug("hidden");
		expect(stderr).not.toHaveBeenCalled();
		createConsoleLogger(true).debug("shown");
		expect(stderr).toHaveBeenCalledWith("[craft-lint]", "shown");
	});

	it("writes messages to stdout", () => {
		const stdout = vi.spyOn(console, "log").mockImplementation(() => undefined);
		createConsoleLogger(false).message("hello");
		expect(stdout).toHaveBeenCalledWith("hello");
	});
});

describe("createMemoryLogger", () => {
	it("records message and debug lines separately", () => {
		const logger = createMemoryLogger();
		logger.message("report");
		logger.debug("detail");
		expect(logger.lines).toEqual({ message: ["report"], debug: ["detail"] });
	});
});
