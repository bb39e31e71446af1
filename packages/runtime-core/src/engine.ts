import type { HostAddress } from "./types";

/** Any callable script value */
export type ScriptFunction = (...args: unknown[]) => unknown;

/**
 * Host callback exposed to script as a function.
 * `newTarget` is set when the function is invoked as a constructor (directly or through `super()`).
 */
export type NativeCallback = (self: unknown, args: unknown[], newTarget: unknown) => unknown;

/**
 * Handle that keeps a script object reachable (strong) or lets the collector take it (weak).
 */
export interface PersistentHandle<T extends object> {
	/** The referenced object, or undefined once collected or reset */
	get(): T | undefined;
	isEmpty(): boolean;
	isWeak(): boolean;
	/**
	 * Make the handle weak. The callback runs once, after the engine collected the object;
	 * the handle is already empty at that point.
	 */
	setWeak(onCollected: () => void): void;
	/** Make a weak handle strong again */
	clearWeak(): void;
	/** Drop the reference without running the weak callback */
	reset(): void;
}

/**
 * Scope for temporary values created during a host-initiated operation
 */
export interface HandleScope {
	close(): void;
}

export interface HeapStatistics {
	totalHeapSize: number;
	usedHeapSize: number;
	heapSizeLimit: number;
}

/**
 * The script engine the runtime embeds: one isolated heap with one global context.
 * Script values are plain JavaScript values living in the engine's realm.
 */
export interface ScriptEngine {
	readonly name: string;

	/**
	 * Run source in the global context
	 * @throws the script exception when evaluation throws
	 */
	evaluate(source: string, filename: string): unknown;

	/**
	 * Compile source without running it
	 * @throws the syntax error when compilation fails
	 */
	compile(source: string, filename: string): void;

	newObject(): object;
	newArray(items: unknown[]): unknown[];
	newError(message: string): object;
	newFunction(name: string, callback: NativeCallback): ScriptFunction;
	newPersistent<T extends object>(value: T): PersistentHandle<T>;

	/** Tag a script object with the address of the host object it wraps */
	setInternalField(target: object, address: HostAddress | undefined): void;
	getInternalField(target: object): HostAddress | undefined;

	isPromise(value: unknown): boolean;

	openHandleScope(): HandleScope;
	performMicrotaskCheckpoint(): void;
	collectGarbage(): void;

	/**
	 * Deserialize a message buffer into a script value
	 * @throws when the buffer is malformed
	 */
	deserialize(buffer: Uint8Array): unknown;

	setGlobal(name: string, value: unknown): void;
	getGlobal(name: string): unknown;

	/** Single slot for the embedder (the runtime stores its environment token here) */
	setEmbedderData(data: number | undefined): void;
	getEmbedderData(): number | undefined;

	getHeapStatistics(): HeapStatistics;
	dispose(): void;
}

export interface ScriptEngineOptions {
	/** Name used in diagnostics */
	name?: string;
}

export interface ScriptEngineProvider {
	createEngine(options: ScriptEngineOptions): ScriptEngine;
}

export function isScriptFunction(value: unknown): value is ScriptFunction {
	return typeof value === "function";
}

export function isScriptObject(value: unknown): value is object {
	return (typeof value === "object" && value !== null) || typeof value === "function";
}
