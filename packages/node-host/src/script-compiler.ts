import { transform } from "sucrase";
import type { ScriptLoaderType, SourceTransformer } from "@hostscript/runtime-core";

type SucraseTransform = "typescript" | "imports";

interface CompiledModule {
	source: string;
	code: string;
}

const TRANSFORMS: Record<ScriptLoaderType, SucraseTransform[]> = {
	ts: ["typescript", "imports"],
	js: ["imports"],
};

/**
 * Module transformer for the resolver: strips types and rewrites `import`/`export` into the
 * `require`/`exports` calls the module wrapper provides. Sucrase does no type checking.
 *
 * Output is kept per module path and reused while the source text is the same, so a reload
 * of an untouched dependency does not transform it again.
 */
export class ScriptCompiler implements SourceTransformer {
	private compiled = new Map<string, CompiledModule>();

	transform(path: string, source: string, loader: ScriptLoaderType): string {
		const previous = this.compiled.get(path);
		if (previous?.source === source) {
			return previous.code;
		}
		const { code } = transform(source, { filePath: path, transforms: TRANSFORMS[loader] });
		this.compiled.set(path, { source, code });
		return code;
	}

	/** Forget the output for one module, e.g. after its file changed or was deleted */
	invalidate(path: string): void {
		this.compiled.delete(path);
	}

	clear(): void {
		this.compiled.clear();
	}

	get size(): number {
		return this.compiled.size;
	}
}
