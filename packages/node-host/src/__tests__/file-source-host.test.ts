import fs from "fs";
import path from "path";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { FileSourceHost } from "../file-source-host";
import { TempSourceDir } from "./test-helpers";

/**
 * FileSourceHost Tests
 *
 * Test Philosophy: module ids are paths under the root, read synchronously with their
 * modification time and the loader their extension implies.
 */

describe("FileSourceHost - Desired Behavior", () => {
	let dir: TempSourceDir;
	let host: FileSourceHost;

	beforeEach(() => {
		dir = new TempSourceDir();
		host = new FileSourceHost(dir.root);
	});

	afterEach(() => {
		dir.remove();
	});

	describe("Read Contract", () => {
		it("should read contents, mtime and loader type", () => {
			const fullPath = dir.write("lib/main.ts", "export const a = 1;");

			const info = host.readFile("lib/main.ts");

			expect(info.contents).toBe("export const a = 1;");
			expect(info.mtime).toBe(fs.statSync(fullPath).mtimeMs);
			expect(info.loaderType).toBe("ts");
		});

		it("should treat anything but .ts as JavaScript", () => {
			dir.write("plain.js", "module.exports = 1;");

			expect(host.readFile("plain.js").loaderType).toBe("js");
		});

		it("should accept absolute paths", () => {
			const fullPath = dir.write("abs.js", "1");

			expect(host.readFile(fullPath).contents).toBe("1");
		});

		it("should throw for missing files and directories", () => {
			fs.mkdirSync(path.join(dir.root, "folder"));

			expect(() => host.readFile("missing.js")).toThrow("File not found or is not a file: missing.js");
			expect(() => host.readFile("folder")).toThrow("File not found or is not a file: folder");
		});
	});

	describe("Existence Contract", () => {
		it("should report only regular files", () => {
			dir.write("lib/index.js", "");

			expect(host.exists("lib/index.js")).toBe(true);
			expect(host.exists("lib")).toBe(false);
			expect(host.exists("nope.js")).toBe(false);
		});

		it("should report modification time or null", () => {
			const fullPath = dir.write("timed.js", "");

			expect(host.getModifiedTime("timed.js")).toBe(fs.statSync(fullPath).mtimeMs);
			expect(host.getModifiedTime("gone.js")).toBeNull();
		});

		it("should see a new modification time after a rewrite", () => {
			dir.write("edit.js", "1");
			const before = host.getModifiedTime("edit.js");
			dir.write("edit.js", "2");

			expect(host.getModifiedTime("edit.js")).not.toBe(before);
		});
	});

	it("should resolve the root to an absolute path", () => {
		expect(path.isAbsolute(host.root)).toBe(true);
	});
});
