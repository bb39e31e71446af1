import { describe, it, expect, vi, afterEach } from "vitest";
import { ConsoleLogger, isLogLevel } from "../console-logger";

/**
 * ConsoleLogger Tests
 *
 * Test Philosophy: messages carry the prefix and respect the minimum level; errors always print.
 */

describe("ConsoleLogger - Desired Behavior", () => {
	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("should prefix every message", () => {
		const info = vi.spyOn(console, "info").mockImplementation(() => {});
		const logger = new ConsoleLogger("[test]");

		logger.info("loaded", 3);

		expect(info).toHaveBeenCalledWith("[test]", "loaded", 3);
	});

	it("should drop messages below the minimum level", () => {
		const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		const logger = new ConsoleLogger("[test]", "warn");

		logger.debug("hidden");
		logger.warn("shown");

		expect(debug).not.toHaveBeenCalled();
		expect(warn).toHaveBeenCalledWith("[test]", "shown");
	});

	it("should always print errors", () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => {});
		const logger = new ConsoleLogger("[test]", "error");

		logger.error("failed");

		expect(error).toHaveBeenCalledWith("[test]", "failed");
	});

	it("should default to the info level", () => {
		const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
		const info = vi.spyOn(console, "info").mockImplementation(() => {});
		const logger = new ConsoleLogger();

		logger.debug("hidden");
		logger.info("shown");

		expect(debug).not.toHaveBeenCalled();
		expect(info).toHaveBeenCalledWith("[hostscript]", "shown");
	});

	it("should recognize log level names", () => {
		expect(isLogLevel("warn")).toBe(true);
		expect(isLogLevel("trace")).toBe(false);
		expect(isLogLevel(1)).toBe(false);
	});
});
