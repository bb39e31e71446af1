import type { ScriptClassId } from "../types";
import type { ModuleResolver } from "./module-resolver";

/**
 * Where a module's source came from, used to detect external edits
 */
export interface ModuleSourceInfo {
	sourceFilepath: string;
	mtime: number;
	/** Text the module was last loaded from */
	source: string;
}

/**
 * A loaded unit of script source. The instance, its script-side `module` object, its exports
 * object and its children array keep their identity across reloads.
 */
export class JavaScriptModule {
	sourceInfo: ModuleSourceInfo | null = null;
	/** Class parsed from the default export; such modules are reloaded only through their class */
	scriptClassId: ScriptClassId = 0;
	reloadRequested = false;
	loaded = false;
	/** Source is executing; a circular require gets the partial exports */
	loading = false;

	constructor(
		public readonly id: string,
		/** Script-side `module` object */
		public readonly moduleObject: object,
		/** Exports object created with the module; restored as `module.exports` before a reload */
		public readonly exportsObject: object,
		/** Script-side array of child `module` objects */
		public readonly children: unknown[],
		/** Resolver that produced the source, or null for a virtual module */
		public readonly resolver: ModuleResolver | null
	) {}

	get isVirtual(): boolean {
		return this.resolver === null;
	}

	/** Current value of `module.exports` */
	get exports(): unknown {
		return Reflect.get(this.moduleObject, "exports");
	}

	markLoaded(loaded: boolean): void {
		this.loaded = loaded;
		Reflect.set(this.moduleObject, "loaded", loaded);
	}

	/**
	 * Empty the exports object and make it `module.exports` again, ready to run the new source
	 */
	resetExports(): void {
		for (const key of Reflect.ownKeys(this.exportsObject)) {
			Reflect.deleteProperty(this.exportsObject, key);
		}
		Reflect.set(this.moduleObject, "exports", this.exportsObject);
	}
}
