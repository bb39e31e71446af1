import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { createNodeRuntime, type NodeRuntime } from "../create-runtime";
import { SourceWatcher } from "../source-watcher";
import { MockLogger, MockWatchableSource, TempSourceDir } from "./test-helpers";

/**
 * SourceWatcher Tests
 *
 * Test Philosophy: bursts of change notifications end in one reload pass that updates
 * loaded modules in place; class modules reload through their class.
 */

const CLASS_SOURCE = `
const { Node } = require("host");
class Greeter extends Node {
	greet() { return "hello"; }
}
exports.default = Greeter;
`;

describe("SourceWatcher - Desired Behavior", () => {
	let dir: TempSourceDir;
	let logger: MockLogger;
	let node: NodeRuntime;
	let source: MockWatchableSource;
	let watcher: SourceWatcher;

	beforeEach(() => {
		vi.useFakeTimers();
		dir = new TempSourceDir();
		logger = new MockLogger();
		node = createNodeRuntime({ root: dir.root, logger, config: { watch: false } });
		source = new MockWatchableSource();
		watcher = new SourceWatcher(node.runtime, source, logger, { debounceMs: 100, invalidate: node.compiler });
	});

	afterEach(() => {
		watcher.stop();
		node.dispose();
		dir.remove();
		vi.useRealTimers();
	});

	function exportsValue(moduleId: string, key: string): unknown {
		const module = node.runtime.findModule(moduleId);
		return module ? Reflect.get(module.exportsObject, key) : undefined;
	}

	describe("Debounce Contract", () => {
		it("should reload a changed module after the quiet period", () => {
			dir.write("counter.js", "exports.value = 1;");
			expect(node.runtime.load("counter").status).toBe("Ok");
			watcher.start();

			dir.write("counter.js", "exports.value = 2;");
			source.emit("counter.js");
			vi.advanceTimersByTime(99);
			expect(exportsValue("counter.js", "value")).toBe(1);

			vi.advanceTimersByTime(1);
			expect(exportsValue("counter.js", "value")).toBe(2);
			expect(logger.messages("info")).toContain("[SourceWatcher] Reloaded 1 module(s)");
		});

		it("should collapse a burst of changes into one pass", () => {
			dir.write("a.js", "exports.value = 1;");
			node.runtime.load("a");
			const scan = vi.spyOn(node.runtime, "scanExternalChanges");
			watcher.start();

			source.emit("a.js");
			vi.advanceTimersByTime(60);
			source.emit("a.js");
			vi.advanceTimersByTime(60);
			expect(scan).not.toHaveBeenCalled();

			vi.advanceTimersByTime(40);
			expect(scan).toHaveBeenCalledTimes(1);
		});
	});

	describe("Reload Contract", () => {
		it("should leave unchanged modules alone", () => {
			dir.write("same.js", "exports.loads = (exports.loads || 0) + 1;");
			node.runtime.load("same");
			watcher.start();

			source.emit("same.js");

			expect(watcher.flush()).toBe(0);
			expect(exportsValue("same.js", "loads")).toBe(1);
		});

		it("should ignore files that were never loaded", () => {
			watcher.start();
			source.emit("other.js");

			expect(watcher.flush()).toBe(0);
			expect(logger.messages("debug")).toContain("[SourceWatcher] Ignoring change to unloaded file: other.js");
		});

		it("should invalidate compiled output for changed paths", () => {
			const invalidate = vi.spyOn(node.compiler, "invalidate");
			watcher.start();

			source.emit("lib/util.ts");
			watcher.flush();

			expect(invalidate).toHaveBeenCalledWith("lib/util.ts");
		});

		it("should reload class modules through their class", () => {
			node.database.registerClass(node.runtime, { name: "Node" });
			dir.write("greeter.js", CLASS_SOURCE);
			const classId = node.runtime.load("greeter").module?.scriptClassId ?? 0;
			expect(classId).not.toBe(0);
			const reloadClass = vi.spyOn(node.runtime, "reloadScriptClass");
			watcher.start();

			dir.write("greeter.js", CLASS_SOURCE.replace("greet()", "wave()"));
			source.emit("greeter.js");

			expect(watcher.flush()).toBe(1);
			expect(reloadClass).toHaveBeenCalledWith(classId);
			expect(node.runtime.findModule("greeter.js")?.scriptClassId).toBe(classId);
			expect([...(node.runtime.getScriptClass(classId)?.methods ?? [])]).toEqual(["wave"]);
		});

		it("should warn when a class reload fails", () => {
			node.database.registerClass(node.runtime, { name: "Node" });
			dir.write("greeter.js", CLASS_SOURCE);
			node.runtime.load("greeter");
			watcher.start();

			dir.write("greeter.js", "class {");
			source.emit("greeter.js");

			expect(watcher.flush()).toBe(0);
			expect(logger.messages("warn")).toContain("[SourceWatcher] Class reload of greeter.js returned ModuleLoadFailed");
		});
	});

	describe("Lifecycle Contract", () => {
		it("should drop pending changes and unsubscribe on stop", () => {
			dir.write("counter.js", "exports.value = 1;");
			node.runtime.load("counter");
			watcher.start();
			dir.write("counter.js", "exports.value = 2;");
			source.emit("counter.js");

			watcher.stop();
			vi.advanceTimersByTime(1000);

			expect(exportsValue("counter.js", "value")).toBe(1);
			expect(source.listenerCount).toBe(0);
			expect(source.disposeCount).toBe(1);
			expect(watcher.isWatching).toBe(false);
		});

		it("should subscribe only once", () => {
			watcher.start();
			watcher.start();

			expect(source.listenerCount).toBe(1);
		});

		it("should do nothing once the runtime is gone", () => {
			dir.write("counter.js", "exports.value = 1;");
			node.runtime.load("counter");
			watcher.start();
			source.emit("counter.js");

			node.runtime.destroy();

			expect(watcher.flush()).toBe(0);
		});
	});
});
