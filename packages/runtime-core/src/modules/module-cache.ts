import type { JavaScriptModule } from "./javascript-module";

/**
 * Loaded modules by resolved id
 */
export class ModuleCache {
	private modules = new Map<string, JavaScriptModule>();
	private main: JavaScriptModule | null = null;

	constructor(
		/** Script-side object mirroring the cache, exposed as `require.cache` */
		public readonly cacheObject: object
	) {}

	find(moduleId: string): JavaScriptModule | undefined {
		return this.modules.get(moduleId);
	}

	insert(module: JavaScriptModule): void {
		this.modules.set(module.id, module);
		Reflect.set(this.cacheObject, module.id, module.moduleObject);
	}

	remove(moduleId: string): boolean {
		const module = this.modules.get(moduleId);
		if (!module) {
			return false;
		}
		this.modules.delete(moduleId);
		Reflect.deleteProperty(this.cacheObject, moduleId);
		if (this.main === module) {
			this.main = null;
		}
		return true;
	}

	getMain(): JavaScriptModule | null {
		return this.main;
	}

	setMain(module: JavaScriptModule): void {
		this.main = module;
	}

	values(): JavaScriptModule[] {
		return [...this.modules.values()];
	}

	get size(): number {
		return this.modules.size;
	}

	deinit(): void {
		for (const moduleId of this.modules.keys()) {
			Reflect.deleteProperty(this.cacheObject, moduleId);
		}
		this.modules.clear();
		this.main = null;
	}
}
