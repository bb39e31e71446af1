import { describe, it, expect } from "vitest";
import { NodePathUtils } from "../node-path-utils";

/**
 * NodePathUtils Tests
 *
 * Test Philosophy: module ids stay POSIX-style on every platform.
 */

describe("NodePathUtils - Desired Behavior", () => {
	const paths = new NodePathUtils();

	it("should join with forward slashes", () => {
		expect(paths.join("node_modules", "pkg\\index.js")).toBe("node_modules/pkg/index.js");
	});

	it("should resolve relative segments while joining", () => {
		expect(paths.join("lib", "util\\..", "core.js")).toBe("lib/core.js");
	});

	it("should leave a leading parent segment for the resolver to reject", () => {
		expect(paths.join("scripts", "../../secret")).toBe("../secret");
	});
});
