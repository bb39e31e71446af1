import type { PersistentHandle, ScriptEngine } from "./engine";

/**
 * Strong persistent handle with an explicit reference count.
 * Created with a count of one; the handle is reset when the count drops to zero.
 */
export class StrongRef<T extends object> {
	private handle: PersistentHandle<T>;
	private count = 1;

	constructor(engine: ScriptEngine, value: T) {
		this.handle = engine.newPersistent(value);
	}

	get refCount(): number {
		return this.count;
	}

	get(): T | undefined {
		return this.handle.get();
	}

	ref(): void {
		this.count++;
	}

	/**
	 * @returns true when this was the last reference and the handle has been reset
	 */
	unref(): boolean {
		if (this.count === 0) {
			return true;
		}
		this.count--;
		if (this.count === 0) {
			this.handle.reset();
			return true;
		}
		return false;
	}

	reset(): void {
		this.count = 0;
		this.handle.reset();
	}
}

/**
 * Lookup keyed by script object identity that does not keep its keys alive.
 */
export class WeakIdentityMap<K extends object, V> {
	private map = new WeakMap<K, V>();

	get(key: K): V | undefined {
		return this.map.get(key);
	}

	set(key: K, value: V): void {
		this.map.set(key, value);
	}

	has(key: K): boolean {
		return this.map.has(key);
	}

	delete(key: K): boolean {
		return this.map.delete(key);
	}

	clear(): void {
		this.map = new WeakMap<K, V>();
	}
}
