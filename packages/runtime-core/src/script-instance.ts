import type { CallResult } from "./call-bridge";
import type { HostObject } from "./host-object";
import { nil, type HostValue } from "./host-value";
import type { Runtime } from "./runtime";
import type { FunctionId, ObjectId, ScriptClassId } from "./types";

/**
 * Host-side handle for a host object that has a script class attached.
 * Host lifecycle events are dispatched to script methods through `call()`.
 */
export class ScriptInstance {
	private methodIds = new Map<string, FunctionId>();
	private disposed = false;

	private constructor(
		private runtime: Runtime,
		public readonly host: HostObject,
		private classId: ScriptClassId,
		public readonly objectId: ObjectId
	) {}

	/**
	 * Cross-bind a script class onto a host object
	 * @returns undefined when the class cannot be instantiated for this object
	 */
	static create(runtime: Runtime, host: HostObject, classId: ScriptClassId): ScriptInstance | undefined {
		const objectId = runtime.crossbind(host, classId);
		if (objectId === 0) {
			return undefined;
		}
		return new ScriptInstance(runtime, host, classId, objectId);
	}

	get scriptClassId(): ScriptClassId {
		return this.classId;
	}

	hasMethod(name: string): boolean {
		return this.runtime.getScriptClass(this.classId)?.methods.has(name) ?? false;
	}

	/**
	 * Invoke a script method with the bound object as `this`
	 */
	call(name: string, args: readonly HostValue[] = []): CallResult {
		if (this.disposed || !this.hasMethod(name)) {
			return { status: "InvalidMethodCall", value: nil };
		}
		let functionId = this.methodIds.get(name);
		if (functionId === undefined || !this.runtime.getFunctionCache().isValid(functionId)) {
			functionId = this.runtime.retainFunction(this.objectId, name);
			if (functionId === 0) {
				return { status: "InvalidMethodCall", value: nil };
			}
			this.methodIds.set(name, functionId);
		}
		return this.runtime.callFunction(this.objectId, functionId, args);
	}

	/**
	 * Read a declared property
	 */
	get(name: string): HostValue | undefined {
		const property = this.runtime.getScriptClass(this.classId)?.properties.get(name);
		return property ? this.runtime.getScriptPropertyValue(this.objectId, property) : undefined;
	}

	/**
	 * Assign a declared property
	 */
	set(name: string, value: HostValue): boolean {
		const property = this.runtime.getScriptClass(this.classId)?.properties.get(name);
		return property ? this.runtime.setScriptPropertyValue(this.objectId, property, value) : false;
	}

	/**
	 * Switch to another (or a reloaded) class without constructing the object again
	 */
	rebind(classId: ScriptClassId = this.classId): boolean {
		if (this.disposed || !this.runtime.rebind(this.objectId, classId)) {
			return false;
		}
		this.classId = classId;
		this.releaseMethods();
		return true;
	}

	/**
	 * Release cached methods on the next `update()`, since a host may dispose while one of them
	 * is still running. The binding itself ends with the host object.
	 */
	dispose(): void {
		if (this.disposed) {
			return;
		}
		this.disposed = true;
		const functionIds = [...this.methodIds.values()];
		this.methodIds.clear();
		const { runtime } = this;
		runtime.deferRelease({
			release: () => {
				for (const functionId of functionIds) {
					runtime.releaseFunction(functionId);
				}
			},
		});
	}

	private releaseMethods(): void {
		for (const functionId of this.methodIds.values()) {
			this.runtime.releaseFunction(functionId);
		}
		this.methodIds.clear();
	}
}
