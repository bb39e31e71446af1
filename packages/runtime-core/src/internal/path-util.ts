/**
 * Module id helpers. Ids use "/" separators regardless of platform.
 */

export function isRelativeId(id: string): boolean {
	return id.startsWith("./") || id.startsWith("../");
}

/**
 * Directory part of a module id ("" for a top-level id)
 */
export function dirname(id: string): string {
	const lastSlash = id.lastIndexOf("/");
	return lastSlash === -1 ? "" : id.slice(0, lastSlash);
}

/**
 * Collapse "." and ".." segments and duplicate separators.
 * @returns null when the result is empty or escapes above the root
 */
export function extract(id: string): string | null {
	const absolute = id.startsWith("/");
	const segments: string[] = [];
	for (const segment of id.replace(/\\/g, "/").split("/")) {
		if (segment === "" || segment === ".") {
			continue;
		}
		if (segment === "..") {
			if (segments.length === 0) {
				return null;
			}
			segments.pop();
			continue;
		}
		segments.push(segment);
	}
	if (segments.length === 0) {
		return null;
	}
	const joined = segments.join("/");
	return absolute ? `/${joined}` : joined;
}

/**
 * Resolve a relative id against the directory of the requesting module
 */
export function combine(parentDir: string, id: string): string | null {
	return extract(parentDir === "" ? id : `${parentDir}/${id}`);
}
