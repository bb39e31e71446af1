import { extract } from "../internal/path-util";
import type { Logger, PathUtils, ScriptLoaderType, SourceHost } from "../types";
import type { JavaScriptModule } from "./javascript-module";

const MODULE_EXTENSIONS: ScriptLoaderType[] = ["js", "ts"];

/**
 * What resolvers and loaders need from the runtime while populating a module
 */
export interface ModuleHost {
	readonly logger: Logger;
	/**
	 * Run compiled CommonJS source as the body of a module
	 * @returns false when evaluation threw (the exception has been logged)
	 */
	executeModule(module: JavaScriptModule, code: string): boolean;
}

/**
 * Turns source into CommonJS the module wrapper can run
 */
export interface SourceTransformer {
	transform(path: string, source: string, loader: ScriptLoaderType): string;
}

export interface ResolvedSource {
	/** Resolved path; becomes the module id */
	sourceFilepath: string;
}

/**
 * Path-based module source. Resolvers are consulted in order; the first match wins.
 */
export interface ModuleResolver {
	resolve(moduleId: string): ResolvedSource | null;
	/**
	 * Read, transform and execute the module's source
	 * @returns false on failure (already logged)
	 */
	load(host: ModuleHost, module: JavaScriptModule): boolean;
	/**
	 * Whether the source behind a loaded module changed since it was loaded
	 */
	hasChanged(module: JavaScriptModule): boolean;
}

/**
 * Named synthetic module that cannot be reloaded
 */
export interface ModuleLoader {
	/**
	 * Populate `module.exports`
	 * @returns false on failure
	 */
	load(host: ModuleHost, module: JavaScriptModule): boolean;
}

export interface DefaultModuleResolverOptions {
	sourceHost: SourceHost;
	pathUtils: PathUtils;
	/** Required to load .ts sources and ES module syntax */
	transformer?: SourceTransformer;
	/** Directories searched in order; "" is the source root */
	searchPaths?: string[];
}

/**
 * Resolves module ids against ordered search paths through a SourceHost.
 *
 * Resolution rules:
 * - Ids with a known extension are used as they are
 * - Extensionless ids try ".js", ".ts", then "index.js"/"index.ts"
 * - Candidates that escape above the search root are skipped
 */
export class DefaultModuleResolver implements ModuleResolver {
	private sourceHost: SourceHost;
	private pathUtils: PathUtils;
	private transformer?: SourceTransformer;
	private searchPaths: string[];

	constructor(options: DefaultModuleResolverOptions) {
		this.sourceHost = options.sourceHost;
		this.pathUtils = options.pathUtils;
		this.transformer = options.transformer;
		this.searchPaths = options.searchPaths && options.searchPaths.length > 0 ? options.searchPaths : [""];
	}

	getSearchPaths(): readonly string[] {
		return this.searchPaths;
	}

	resolve(moduleId: string): ResolvedSource | null {
		for (const searchPath of this.searchPaths) {
			const base = extract(searchPath === "" ? moduleId : this.pathUtils.join(searchPath, moduleId));
			if (base === null) {
				continue;
			}
			for (const candidate of this.getCandidates(base)) {
				if (this.sourceHost.exists(candidate)) {
					return { sourceFilepath: candidate };
				}
			}
		}
		return null;
	}

	load(host: ModuleHost, module: JavaScriptModule): boolean {
		const path = module.id;
		let code: string;
		try {
			const file = this.sourceHost.readFile(path);
			module.sourceInfo = { sourceFilepath: path, mtime: file.mtime, source: file.contents };
			code = this.compile(path, file.contents, file.loaderType);
		} catch (error) {
			host.logger.error(`[ModuleResolver] Failed to read module ${path}:`, error);
			return false;
		}
		return host.executeModule(module, code);
	}

	hasChanged(module: JavaScriptModule): boolean {
		const info = module.sourceInfo;
		if (!info) {
			return false;
		}
		const mtime = this.sourceHost.getModifiedTime(info.sourceFilepath);
		if (mtime === null || mtime === info.mtime) {
			return false;
		}
		if (this.sourceHost.readFile(info.sourceFilepath).contents === info.source) {
			info.mtime = mtime;
			return false;
		}
		return true;
	}

	private compile(path: string, source: string, loader: ScriptLoaderType): string {
		if (this.transformer) {
			return this.transformer.transform(path, source, loader);
		}
		if (loader === "ts") {
			throw new Error(`No source transformer configured for TypeScript module ${path}`);
		}
		return source;
	}

	private getCandidates(base: string): string[] {
		const hasKnownExtension = MODULE_EXTENSIONS.some((ext) => base.endsWith(`.${ext}`));
		if (hasKnownExtension) {
			return [base];
		}
		const direct = MODULE_EXTENSIONS.map((ext) => `${base}.${ext}`);
		const indexed = MODULE_EXTENSIONS.map((ext) => this.pathUtils.join(base, `index.${ext}`));
		return [...direct, ...indexed];
	}
}
