/**
 * Stable address of a host object. The core never owns the memory behind it.
 */
export type HostAddress = number;

/** Id of a binding in the object registry (0 means "no binding") */
export type ObjectId = number;

/** Id of a cached script function (0 means "no function") */
export type FunctionId = number;

/** Id of a registered native class (0 means "no class") */
export type NativeClassId = number;

/** Id of a parsed script class (0 means "no class") */
export type ScriptClassId = number;

/**
 * Script file type
 */
export type ScriptLoaderType = "js" | "ts";

/**
 * File information returned by SourceHost.readFile
 */
export interface FileInfo {
	/** File contents as string */
	contents: string;
	/** Last modification time (Unix timestamp in milliseconds) */
	mtime: number;
	/** Explicit loader type for this source (owned by SourceHost implementation) */
	loaderType: ScriptLoaderType;
}

/**
 * Disposable resource that can be cleaned up
 */
export interface Disposable {
	dispose(): void;
}

/**
 * Read access to script sources.
 * Module loading runs synchronously on the owning thread, so every call here is synchronous.
 */
export interface SourceHost {
	/**
	 * Read a script and return source, loader type, and modification time
	 * @throws Error if the file cannot be read
	 */
	readFile(path: string): FileInfo;

	/**
	 * Check if a path exists and is a file
	 */
	exists(path: string): boolean;

	/**
	 * Last modification time of a file, or null if it does not exist
	 */
	getModifiedTime(path: string): number | null;
}

/**
 * Joins module ids and search paths. Results use "/" on every platform.
 */
export interface PathUtils {
	join(...paths: string[]): string;
}

/**
 * Abstract interface for logging.
 * Platform-specific implementations handle log output.
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

/**
 * Something whose release has to wait until the runtime is between script calls.
 */
export interface Releasable {
	release(): void;
}
