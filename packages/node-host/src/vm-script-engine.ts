import { types } from "util";
import v8 from "v8";
import vm from "vm";
import type {
	HandleScope,
	HeapStatistics,
	HostAddress,
	NativeCallback,
	PersistentHandle,
	ScriptEngine,
	ScriptEngineOptions,
	ScriptEngineProvider,
	ScriptFunction,
} from "@hostscript/runtime-core";

export interface VmScriptEngineOptions extends ScriptEngineOptions {
	/**
	 * "afterEvaluate" gives the context its own microtask queue, drained only by
	 * `performMicrotaskCheckpoint()` and by evaluations. By default microtasks share Node's queue.
	 */
	microtaskMode?: "afterEvaluate";
}

/**
 * Object factories evaluated inside the context, so the values they create belong to the script realm
 */
interface Realm {
	newObject(): object;
	newArray(items: unknown[]): unknown[];
	newError(message: string): object;
	newFunction(name: string, callback: NativeCallback): ScriptFunction;
}

const REALM_SOURCE = `(() => ({
	newObject: () => ({}),
	newArray: (items) => Array.from(items),
	newError: (message) => new Error(message),
	newFunction: (name, callback) => {
		const fn = function (...args) {
			return callback(this, args, new.target);
		};
		Object.defineProperty(fn, "name", { value: name });
		return fn;
	},
}))()`;

const REALM_KEYS = ["newObject", "newArray", "newError", "newFunction"];

function isRealm(value: unknown): value is Realm {
	return (
		typeof value === "object" &&
		value !== null &&
		REALM_KEYS.every((key) => typeof Reflect.get(value, key) === "function")
	);
}

const noopScope: HandleScope = {
	close() {},
};

/**
 * Persistent handle over a strong reference or a WeakRef.
 * Collection is reported through a FinalizationRegistry, so the weak callback runs on a later task.
 */
class VmPersistentHandle<T extends object> implements PersistentHandle<T> {
	private strong: T | undefined;
	private weak: WeakRef<T> | undefined;
	private onCollected?: () => void;

	constructor(
		value: T,
		private finalizers: FinalizationRegistry<() => void>
	) {
		this.strong = value;
	}

	get(): T | undefined {
		return this.strong ?? this.weak?.deref();
	}

	isEmpty(): boolean {
		return this.get() === undefined;
	}

	isWeak(): boolean {
		return this.weak !== undefined;
	}

	setWeak(onCollected: () => void): void {
		const value = this.strong;
		this.onCollected = onCollected;
		if (value === undefined) {
			return;
		}
		this.weak = new WeakRef(value);
		this.finalizers.register(value, () => this.collected(), this);
		this.strong = undefined;
	}

	/**
	 * A value that is already collected stays weak; its pending callback still runs
	 */
	clearWeak(): void {
		const value = this.weak?.deref();
		if (value === undefined) {
			return;
		}
		this.finalizers.unregister(this);
		this.weak = undefined;
		this.onCollected = undefined;
		this.strong = value;
	}

	reset(): void {
		this.finalizers.unregister(this);
		this.strong = undefined;
		this.weak = undefined;
		this.onCollected = undefined;
	}

	private collected(): void {
		const callback = this.onCollected;
		this.weak = undefined;
		this.onCollected = undefined;
		callback?.();
	}
}

/**
 * Script engine backed by a `vm` context of the running Node.js process
 */
export class VmScriptEngine implements ScriptEngine {
	readonly name: string;
	private context: vm.Context;
	private realm: Realm;
	private internalFields = new WeakMap<object, HostAddress>();
	private finalizers = new FinalizationRegistry<() => void>((collected) => collected());
	private embedderData: number | undefined;
	private disposed = false;

	constructor(options: VmScriptEngineOptions = {}) {
		this.name = options.name ?? "hostscript";
		this.context = vm.createContext({}, { name: this.name, microtaskMode: options.microtaskMode });
		const realm: unknown = vm.runInContext(REALM_SOURCE, this.context, { filename: "<realm>" });
		if (!isRealm(realm)) {
			throw new Error("Failed to initialize the script realm");
		}
		this.realm = realm;
	}

	evaluate(source: string, filename: string): unknown {
		this.assertAlive();
		return vm.runInContext(source, this.context, { filename });
	}

	compile(source: string, filename: string): void {
		new vm.Script(source, { filename });
	}

	newObject(): object {
		return this.realm.newObject();
	}

	newArray(items: unknown[]): unknown[] {
		return this.realm.newArray(items);
	}

	newError(message: string): object {
		return this.realm.newError(message);
	}

	newFunction(name: string, callback: NativeCallback): ScriptFunction {
		return this.realm.newFunction(name, callback);
	}

	newPersistent<T extends object>(value: T): PersistentHandle<T> {
		return new VmPersistentHandle(value, this.finalizers);
	}

	setInternalField(target: object, address: HostAddress | undefined): void {
		if (address === undefined) {
			this.internalFields.delete(target);
		} else {
			this.internalFields.set(target, address);
		}
	}

	getInternalField(target: object): HostAddress | undefined {
		return this.internalFields.get(target);
	}

	isPromise(value: unknown): boolean {
		return types.isPromise(value);
	}

	/**
	 * Values are traced by the collector, so there is nothing to scope
	 */
	openHandleScope(): HandleScope {
		return noopScope;
	}

	performMicrotaskCheckpoint(): void {
		if (!this.disposed) {
			vm.runInContext("", this.context);
		}
	}

	/**
	 * Runs a full collection when the process was started with --expose-gc; otherwise a no-op
	 */
	collectGarbage(): void {
		const gc: unknown = Reflect.get(globalThis, "gc");
		if (typeof gc === "function") {
			Reflect.apply(gc, globalThis, []);
		}
	}

	deserialize(buffer: Uint8Array): unknown {
		const value: unknown = v8.deserialize(buffer);
		return value;
	}

	setGlobal(name: string, value: unknown): void {
		Reflect.set(this.context, name, value);
	}

	getGlobal(name: string): unknown {
		return Reflect.get(this.context, name);
	}

	setEmbedderData(data: number | undefined): void {
		this.embedderData = data;
	}

	getEmbedderData(): number | undefined {
		return this.embedderData;
	}

	getHeapStatistics(): HeapStatistics {
		const stats = v8.getHeapStatistics();
		return {
			totalHeapSize: stats.total_heap_size,
			usedHeapSize: stats.used_heap_size,
			heapSizeLimit: stats.heap_size_limit,
		};
	}

	dispose(): void {
		this.disposed = true;
		this.internalFields = new WeakMap();
	}

	private assertAlive(): void {
		if (this.disposed) {
			throw new Error(`Script engine ${this.name} is disposed`);
		}
	}
}

export const vmScriptEngineProvider: ScriptEngineProvider = {
	createEngine: (options) => new VmScriptEngine(options),
};
