import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { str, array } from "../host-value";
import type { JavaScriptModule } from "../modules/javascript-module";
import { createTestRuntime, type TestRuntime } from "./test-helpers";

/**
 * Runtime Module Tests
 *
 * Test Philosophy: modules behave like CommonJS from the script's point of view and keep
 * their identity when reloaded, so dependents observe the new exports.
 */

function exportsOf(module: JavaScriptModule | null | undefined): Record<string, unknown> {
	const value = module?.exports;
	if (typeof value !== "object" || value === null) {
		throw new Error("module has no exports object");
	}
	return Object.fromEntries(Object.entries(value));
}

function callExport(module: JavaScriptModule | null | undefined, name: string): unknown {
	const fn = exportsOf(module)[name];
	if (typeof fn !== "function") {
		throw new Error(`${name} is not a function`);
	}
	return fn();
}

describe("Runtime modules - Desired Behavior", () => {
	let t: TestRuntime;

	beforeEach(() => {
		t = createTestRuntime();
	});

	afterEach(() => {
		t.runtime.destroy();
	});

	describe("Loading Contract", () => {
		it("should load a module and its relative dependencies", () => {
			t.sources.setFile("main.js", 'const util = require("./lib/util"); exports.answer = util.double(21);');
			t.sources.setFile("lib/util.js", "exports.double = (n) => n * 2;");

			const result = t.runtime.load("main");

			expect(result.status).toBe("Ok");
			expect(result.module?.id).toBe("main.js");
			expect(exportsOf(result.module)).toEqual({ answer: 42 });
			expect(result.module?.children).toHaveLength(1);
			expect(t.runtime.findModule("lib/util.js")?.loaded).toBe(true);
			expect(t.runtime.getMainModule()).toBe(result.module);
		});

		it("should run each module once", () => {
			t.sources.setFile("main.js", 'require("./shared"); require("./shared");');
			t.sources.setFile("shared.js", "exports.loaded = true;");

			const first = t.runtime.load("main");
			const second = t.runtime.load("main");

			expect(second.module).toBe(first.module);
			expect(t.sources.reads).toEqual(["main.js", "shared.js"]);
		});

		it("should resolve index files and explicit extensions", () => {
			t.sources.setFile("widgets/index.js", 'exports.name = "widgets";');
			t.sources.setFile("plain.js", 'exports.name = "plain";');

			expect(t.runtime.load("widgets").module?.id).toBe("widgets/index.js");
			expect(t.runtime.load("plain.js").module?.id).toBe("plain.js");
		});

		it("should report a missing module as FileNotFound", () => {
			const result = t.runtime.load("missing");

			expect(result).toEqual({ status: "FileNotFound", module: null });
			expect(t.logger.getErrors()[0].message).toBe("[Runtime] Something went wrong on loading missing:");
		});

		it("should report an id that escapes the root as BadPath", () => {
			expect(t.runtime.load("../outside")).toEqual({ status: "BadPath", module: null });
		});

		it("should report a module that fails to run as CompilationFailed and forget it", () => {
			t.sources.setFile("broken.js", "exports.x = ;");
			t.sources.setFile("throws.js", 'throw new Error("init failed");');

			expect(t.runtime.load("broken").status).toBe("CompilationFailed");
			expect(t.runtime.load("throws").status).toBe("CompilationFailed");
			expect(t.runtime.findModule("broken.js")).toBeUndefined();
			expect(t.runtime.findModule("throws.js")).toBeUndefined();
		});

		it("should surface a failed require to the requiring script", () => {
			t.sources.setFile("main.js", 'require("./nope");');

			expect(t.runtime.load("main").status).toBe("CompilationFailed");
			const messages = t.logger.getErrors().map((error) => error.message);
			expect(messages[0]).toContain("Unknown module nope");
		});

		it("should refuse TypeScript sources without a transformer", () => {
			t.sources.setFile("typed.ts", "export const x: number = 1;");

			expect(t.runtime.load("typed").status).toBe("CompilationFailed");
			expect(t.logger.getErrors()[0].message).toBe("[ModuleResolver] Failed to read module typed.ts:");
		});

		it("should hand partial exports to a circular require", () => {
			t.sources.setFile("a.js", 'exports.early = 1; const b = require("./b"); exports.fromB = b.sawEarly;');
			t.sources.setFile("b.js", 'const a = require("./a"); exports.sawEarly = a.early;');

			const result = t.runtime.load("a");

			expect(exportsOf(result.module)).toEqual({ early: 1, fromB: 1 });
		});

		it("should expose the main module and the cache through require", () => {
			t.sources.setFile("main.js", "exports.isMain = () => require.main === module;");

			const result = t.runtime.load("main");

			expect(callExport(result.module, "isMain")).toBe(true);
			expect(t.runtime.evalSource("Object.keys(require.cache)").value).toEqual(array([str("main.js")]));
		});

		it("should warn when the requesting module is unknown", () => {
			t.sources.setFile("lib/util.js", "exports.ok = true;");

			const module = t.runtime.loadModule("ghost.js", "lib/util");

			expect(module.loaded).toBe(true);
			expect(t.logger.getWarnings()).toEqual(["[Runtime] Parent module ghost.js of lib/util.js not found"]);
		});

		it("should keep a module whose default export cannot be parsed", () => {
			t.sources.setFile(
				"weird.js",
				'Object.defineProperty(exports, "default", { get() { throw new Error("nope"); } }); exports.ok = true;'
			);

			const result = t.runtime.load("weird");

			expect(result.status).toBe("Ok");
			expect(result.module?.scriptClassId).toBe(0);
			expect(t.logger.getErrors()[0].message.startsWith("[Runtime] Something wrong when parsing script class in weird.js")).toBe(true);
		});
	});

	describe("Virtual Module Contract", () => {
		beforeEach(() => {
			t.runtime.addModuleLoader("config", {
				load: (_host, module) => {
					Reflect.set(module.exportsObject, "mode", "test");
					return true;
				},
			});
		});

		it("should serve virtual modules before searching sources", () => {
			t.sources.setFile("config.js", 'exports.mode = "file";');
			t.sources.setFile("main.js", 'exports.mode = require("config").mode;');

			expect(exportsOf(t.runtime.load("main").module)).toEqual({ mode: "test" });
		});

		it("should refuse to reload a virtual module", () => {
			t.runtime.loadModule("", "config");

			expect(t.runtime.reloadModule("config")).toBe("ModuleLoadFailed");
			expect(t.runtime.markAsReloading("config")).toBe("NoChanges");
		});
	});

	describe("Reload Contract", () => {
		it("should reload changed sources in place", () => {
			t.sources.setFile("counter.js", "exports.value = 1; exports.stale = true;");
			t.sources.setFile("main.js", 'const counter = require("./counter"); exports.read = () => counter.value;');
			const main = t.runtime.load("main").module;
			const counter = t.runtime.findModule("counter.js");
			const exportsBefore = counter?.exports;
			const moduleObjectBefore = counter?.moduleObject;

			t.sources.updateFile("counter.js", "exports.value = 2;");
			expect(t.runtime.markAsReloading("counter.js")).toBe("Requested");
			expect(t.runtime.scanExternalChanges()).toBe(1);

			expect(t.runtime.findModule("counter.js")).toBe(counter);
			expect(counter?.exports).toBe(exportsBefore);
			expect(counter?.moduleObject).toBe(moduleObjectBefore);
			expect(exportsOf(counter)).toEqual({ value: 2 });
			expect(callExport(main, "read")).toBe(2);
			expect(counter?.reloadRequested).toBe(false);
		});

		it("should pick up edited sources during a scan without flagging them first", () => {
			t.sources.setFile("counter.js", "exports.value = 1;");
			t.sources.setFile("steady.js", "exports.loads = (exports.loads || 0) + 1;");
			const counter = t.runtime.load("counter").module;
			const steady = t.runtime.load("steady").module;

			t.sources.updateFile("counter.js", "exports.value = 2;");

			expect(t.runtime.scanExternalChanges()).toBe(1);
			expect(exportsOf(counter)).toEqual({ value: 2 });
			expect(exportsOf(steady)).toEqual({ loads: 1 });
			expect(t.runtime.scanExternalChanges()).toBe(0);
		});

		it("should keep the children array across reloads", () => {
			t.sources.setFile("main.js", 'require("./dep");');
			t.sources.setFile("dep.js", "exports.x = 1;");
			const main = t.runtime.load("main").module;
			const children = main?.children;

			expect(t.runtime.reloadModule("main.js")).toBe("Ok");

			expect(main?.children).toBe(children);
		});

		it("should not reload when only the modification time changed", () => {
			t.sources.setFile("counter.js", "exports.value = 1;");
			t.runtime.load("counter");

			t.sources.touch("counter.js");

			expect(t.runtime.markAsReloading("counter.js")).toBe("NoChanges");
			expect(t.runtime.markAsReloading("counter.js")).toBe("NoChanges");
			expect(t.runtime.scanExternalChanges()).toBe(0);
		});

		it("should report unknown modules", () => {
			expect(t.runtime.markAsReloading("nothing.js")).toBe("NoSuchModule");
			expect(t.runtime.reloadModule("nothing.js")).toBe("NoSuchModule");
		});

		it("should recover after a failed reload", () => {
			t.sources.setFile("counter.js", "exports.value = 1;");
			const counter = t.runtime.load("counter").module;

			t.sources.updateFile("counter.js", "exports.value = ;");
			expect(t.runtime.reloadModule("counter.js")).toBe("ModuleLoadFailed");
			expect(counter?.loaded).toBe(false);
			expect(t.runtime.markAsReloading("counter.js")).toBe("Requested");

			t.sources.updateFile("counter.js", "exports.value = 3;");
			expect(t.runtime.scanExternalChanges()).toBe(1);
			expect(exportsOf(counter)).toEqual({ value: 3 });
		});

		it("should reload a flagged module when it is required again", () => {
			t.sources.setFile("counter.js", "exports.value = 1;");
			t.runtime.load("counter");
			t.sources.updateFile("counter.js", "exports.value = 5;");
			t.runtime.markAsReloading("counter.js");

			const module = t.runtime.loadModule("", "./counter");

			expect(exportsOf(module)).toEqual({ value: 5 });
		});
	});

	describe("Evaluation Contract", () => {
		it("should evaluate source and convert the result", () => {
			expect(t.runtime.evalSource("1 + 2")).toEqual({ status: "Ok", value: { type: "int", value: 3 } });
			expect(t.runtime.evalSource("() => 1")).toEqual({ status: "Ok", value: { type: "nil" } });
		});

		it("should report source that fails to evaluate", () => {
			expect(t.runtime.evalSource("1 +", "snippet.js").status).toBe("CompilationFailed");
			expect(t.logger.getErrors()[0].message.startsWith("[Runtime] Failed to evaluate snippet.js: ")).toBe(true);
		});

		it("should validate without running", () => {
			expect(t.runtime.validateScript("globalThis.validated = true;", "ok.js")).toBe("Ok");
			expect(Reflect.get(globalThis, "validated")).toBeUndefined();
			expect(t.runtime.validateScript("let x = ;", "bad.js")).toBe("CompilationFailed");
			expect(t.logger.getWarnings()).toHaveLength(1);
		});
	});

	describe("Statistics", () => {
		it("should count loaded modules and release them on dispose", () => {
			t.sources.setFile("main.js", 'require("hostscript");');
			t.runtime.load("main");

			expect(t.runtime.getStatistics().modules).toBe(2);

			t.runtime.dispose();
			expect(t.runtime.getStatistics().modules).toBe(0);
			expect(t.runtime.findModule("main.js")).toBeUndefined();
		});
	});
});
