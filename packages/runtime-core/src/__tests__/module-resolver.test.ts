import { describe, it, expect, beforeEach, vi } from "vitest";
import { JavaScriptModule } from "../modules/javascript-module";
import { DefaultModuleResolver, type ModuleHost, type SourceTransformer } from "../modules/module-resolver";
import { MockLogger, MockPathUtils, MockSourceHost } from "./test-helpers";

function newModule(id: string): JavaScriptModule {
	const exportsObject = {};
	return new JavaScriptModule(id, { exports: exportsObject }, exportsObject, [], null);
}

describe("DefaultModuleResolver - Desired Behavior", () => {
	let sources: MockSourceHost;
	let host: ModuleHost & { executed: Array<{ id: string; code: string }> };

	beforeEach(() => {
		sources = new MockSourceHost();
		const executed: Array<{ id: string; code: string }> = [];
		host = {
			logger: new MockLogger(),
			executed,
			executeModule: (module, code) => {
				executed.push({ id: module.id, code });
				return true;
			},
		};
	});

	describe("Resolution Contract", () => {
		it("should search paths in order", () => {
			sources.setFile("node_modules/lodash/index.js", "");
			sources.setFile("local.js", "");
			sources.setFile("node_modules/local.js", "");
			const resolver = new DefaultModuleResolver({
				sourceHost: sources,
				pathUtils: new MockPathUtils(),
				searchPaths: ["", "node_modules"],
			});

			expect(resolver.resolve("lodash")).toEqual({ sourceFilepath: "node_modules/lodash/index.js" });
			expect(resolver.resolve("local")).toEqual({ sourceFilepath: "local.js" });
		});

		it("should prefer .js over .ts and direct files over index files", () => {
			sources.setFile("mod.js", "");
			sources.setFile("mod.ts", "");
			sources.setFile("mod/index.js", "");
			sources.setFile("typed.ts", "");
			sources.setFile("typed/index.js", "");
			const resolver = new DefaultModuleResolver({ sourceHost: sources, pathUtils: new MockPathUtils() });

			expect(resolver.resolve("mod")?.sourceFilepath).toBe("mod.js");
			expect(resolver.resolve("typed")?.sourceFilepath).toBe("typed.ts");
		});

		it("should not resolve ids that escape a search path", () => {
			sources.setFile("secret.js", "");
			const resolver = new DefaultModuleResolver({
				sourceHost: sources,
				pathUtils: new MockPathUtils(),
				searchPaths: ["scripts"],
			});

			expect(resolver.resolve("../../secret")).toBeNull();
			expect(resolver.getSearchPaths()).toEqual(["scripts"]);
		});
	});

	describe("Loading Contract", () => {
		it("should transform sources before executing them", () => {
			sources.setFile("main.ts", "export const x: number = 1;", 7);
			const transformer: SourceTransformer = {
				transform: vi.fn(() => "exports.x = 1;"),
			};
			const resolver = new DefaultModuleResolver({
				sourceHost: sources,
				pathUtils: new MockPathUtils(),
				transformer,
			});
			const module = newModule("main.ts");

			expect(resolver.load(host, module)).toBe(true);

			expect(transformer.transform).toHaveBeenCalledWith("main.ts", "export const x: number = 1;", "ts");
			expect(host.executed).toEqual([{ id: "main.ts", code: "exports.x = 1;" }]);
			expect(module.sourceInfo).toMatchObject({ sourceFilepath: "main.ts", mtime: 7 });
		});

		it("should fail without executing when the source cannot be read", () => {
			const resolver = new DefaultModuleResolver({ sourceHost: sources, pathUtils: new MockPathUtils() });

			expect(resolver.load(host, newModule("gone.js"))).toBe(false);
			expect(host.executed).toEqual([]);
		});
	});

	describe("Change Detection Contract", () => {
		it("should compare contents once the modification time moves", () => {
			sources.setFile("a.js", "exports.a = 1;", 1);
			const resolver = new DefaultModuleResolver({ sourceHost: sources, pathUtils: new MockPathUtils() });
			const module = newModule("a.js");
			resolver.load(host, module);

			expect(resolver.hasChanged(module)).toBe(false);

			sources.updateFile("a.js", "exports.a = 1;", 2);
			expect(resolver.hasChanged(module)).toBe(false);
			expect(module.sourceInfo?.mtime).toBe(2);

			sources.updateFile("a.js", "exports.a = 2;", 3);
			expect(resolver.hasChanged(module)).toBe(true);
		});

		it("should report any edit to the text, however similar", () => {
			sources.setFile("counter.js", "exports.value = 15148;", 1);
			const resolver = new DefaultModuleResolver({ sourceHost: sources, pathUtils: new MockPathUtils() });
			const module = newModule("counter.js");
			resolver.load(host, module);

			sources.updateFile("counter.js", "exports.value = 492332;", 2);

			expect(resolver.hasChanged(module)).toBe(true);
			expect(module.sourceInfo?.source).toBe("exports.value = 15148;");
		});

		it("should treat a deleted or never loaded source as unchanged", () => {
			sources.setFile("a.js", "", 1);
			const resolver = new DefaultModuleResolver({ sourceHost: sources, pathUtils: new MockPathUtils() });
			const module = newModule("a.js");

			expect(resolver.hasChanged(module)).toBe(false);

			resolver.load(host, module);
			sources.deleteFile("a.js");
			expect(resolver.hasChanged(module)).toBe(false);
		});
	});
});
