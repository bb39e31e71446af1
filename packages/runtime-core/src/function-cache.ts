import { isScriptFunction, type ScriptEngine, type ScriptFunction } from "./engine";
import { StrongRef, WeakIdentityMap } from "./handles";
import type { DebugChecks } from "./internal/debug-checks";
import { SlotTable } from "./internal/slot-table";
import type { FunctionId } from "./types";

/**
 * Small integer ids for script functions handed to the host.
 * The same function always maps to the same id while at least one retain is outstanding.
 */
export class FunctionCache {
	private functions = new SlotTable<StrongRef<ScriptFunction>>();
	private identities = new WeakIdentityMap<ScriptFunction, FunctionId>();

	constructor(
		private engine: ScriptEngine,
		private checks: DebugChecks
	) {}

	/**
	 * Retain a script function. Returns 0 if the value is not callable.
	 */
	retain(value: unknown): FunctionId {
		if (!isScriptFunction(value)) {
			return 0;
		}
		const existing = this.identities.get(value);
		if (existing !== undefined) {
			const ref = this.functions.get(existing);
			this.checks.check(ref !== undefined, () => `Function cache lost entry ${existing}`);
			if (ref) {
				ref.ref();
				return existing;
			}
		}
		const functionId = this.functions.add(new StrongRef(this.engine, value));
		this.identities.set(value, functionId);
		return functionId;
	}

	/**
	 * @returns false for an id that is not (or no longer) retained
	 */
	release(functionId: FunctionId): boolean {
		const ref = this.functions.get(functionId);
		if (!ref) {
			return false;
		}
		this.checks.check(ref.refCount > 0, () => `Function ${functionId} released too many times`);
		const fn = ref.get();
		if (ref.unref()) {
			if (fn) {
				this.identities.delete(fn);
			}
			this.functions.remove(functionId);
		}
		return true;
	}

	get(functionId: FunctionId): ScriptFunction | undefined {
		return this.functions.get(functionId)?.get();
	}

	getRefCount(functionId: FunctionId): number {
		return this.functions.get(functionId)?.refCount ?? 0;
	}

	isValid(functionId: FunctionId): boolean {
		return this.functions.isValid(functionId);
	}

	get size(): number {
		return this.functions.size;
	}

	clear(): void {
		for (const [, ref] of this.functions.entries()) {
			ref.reset();
		}
		this.functions.clear();
		this.identities.clear();
	}
}
