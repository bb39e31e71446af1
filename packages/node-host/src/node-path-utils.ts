import path from "path";
import type { PathUtils } from "@hostscript/runtime-core";

/**
 * Module ids always use "/" separators, so Windows-style input is converted before joining.
 */
export class NodePathUtils implements PathUtils {
	join(...paths: string[]): string {
		return path.posix.join(...paths.map((p) => p.replace(/\\/g, "/")));
	}
}
