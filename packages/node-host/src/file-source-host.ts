import fs from "fs";
import path from "path";
import type { Disposable, FileInfo, ScriptLoaderType, SourceHost } from "@hostscript/runtime-core";

/**
 * Receives paths (relative to the source root) of files that changed on disk
 */
export type ChangeListener = (path: string) => void;

/**
 * Something that reports source changes
 */
export interface WatchableSource {
	watch(onChange: ChangeListener): Disposable;
}

/**
 * File-system implementation of SourceHost rooted at a directory.
 * Module ids are resolved relative to the root; absolute ids are used as they are.
 */
export class FileSourceHost implements SourceHost, WatchableSource {
	readonly root: string;

	constructor(root: string) {
		this.root = path.resolve(root);
	}

	readFile(p: string): FileInfo {
		const fullPath = this.toFullPath(p);
		const stat = fs.statSync(fullPath, { throwIfNoEntry: false });
		if (!stat || !stat.isFile()) {
			throw new Error(`File not found or is not a file: ${p}`);
		}
		return {
			contents: fs.readFileSync(fullPath, "utf8"),
			mtime: stat.mtimeMs,
			loaderType: this.getLoaderType(p),
		};
	}

	exists(p: string): boolean {
		return fs.statSync(this.toFullPath(p), { throwIfNoEntry: false })?.isFile() ?? false;
	}

	getModifiedTime(p: string): number | null {
		const stat = fs.statSync(this.toFullPath(p), { throwIfNoEntry: false });
		return stat?.isFile() ? stat.mtimeMs : null;
	}

	/**
	 * Watch the root recursively
	 */
	watch(onChange: ChangeListener): Disposable {
		const watcher = fs.watch(this.root, { recursive: true }, (_event, filename) => {
			if (filename) {
				onChange(filename.replace(/\\/g, "/"));
			}
		});
		return {
			dispose: () => watcher.close(),
		};
	}

	private toFullPath(p: string): string {
		return path.isAbsolute(p) ? p : path.join(this.root, p);
	}

	private getLoaderType(p: string): ScriptLoaderType {
		return p.toLowerCase().endsWith(".ts") ? "ts" : "js";
	}
}
