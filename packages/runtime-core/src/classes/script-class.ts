import { isScriptFunction, isScriptObject, type ScriptFunction } from "../engine";
import { EmbedError } from "../errors";
import type { HostValueType } from "../host-value";
import { SlotTable } from "../internal/slot-table";
import type { NativeClassId, ScriptClassId } from "../types";
import type { NativeClassTable } from "./native-class";

export interface ScriptPropertyInfo {
	name: string;
	type: HostValueType;
}

/**
 * Instance used to read default property values, built on first use
 */
export type DefaultObjectState = { state: "none" } | { state: "failed" } | { state: "ready"; target: object };

export interface ScriptClassInfo {
	id: ScriptClassId;
	readonly moduleId: string;
	className: string;
	nativeClassId: NativeClassId;
	nativeClassName: string;
	scriptConstructor: ScriptFunction;
	properties: Map<string, ScriptPropertyInfo>;
	methods: Set<string>;
	defaultObject: DefaultObjectState;
}

/**
 * Script classes parsed from module default exports.
 * A class keeps its id across reloads of its module; only its contents are replaced.
 */
export class ScriptClassTable {
	private classes = new SlotTable<ScriptClassInfo>();
	private declared = new WeakMap<ScriptFunction, ScriptPropertyInfo[]>();

	constructor(private nativeClasses: NativeClassTable) {}

	/**
	 * Record a property declared by a script class
	 */
	declareProperty(ctor: ScriptFunction, name: string, type: HostValueType): void {
		const list = this.declared.get(ctor) ?? [];
		const existing = list.findIndex((property) => property.name === name);
		if (existing >= 0) {
			list[existing] = { name, type };
		} else {
			list.push({ name, type });
		}
		this.declared.set(ctor, list);
	}

	/**
	 * Parse the default export of a module as a script class.
	 * @param previousId class id from an earlier load of the same module, updated in place
	 * @returns the class id, or 0 when the default export is not a class extending a native class
	 * @throws EmbedError when the class declaration is malformed
	 */
	parse(moduleId: string, exportsValue: unknown, previousId: ScriptClassId): ScriptClassId {
		if (!isScriptObject(exportsValue)) {
			return 0;
		}
		const ctor: unknown = Reflect.get(exportsValue, "default");
		if (!isScriptFunction(ctor)) {
			return 0;
		}
		const native = this.findNativeBase(ctor);
		if (!native) {
			return 0;
		}
		const prototype: unknown = Reflect.get(ctor, "prototype");
		if (!isScriptObject(prototype)) {
			throw new EmbedError(`Class in ${moduleId} has no prototype`, "ModuleLoadFailed", { moduleId });
		}

		const contents: Omit<ScriptClassInfo, "id" | "moduleId"> = {
			className: ctor.name || moduleId,
			nativeClassId: native.classId,
			nativeClassName: this.nativeClasses.getName(native.classId),
			scriptConstructor: ctor,
			properties: this.collectProperties(ctor, native.ctor),
			methods: this.collectMethods(prototype, native.prototype),
			defaultObject: { state: "none" },
		};

		const existing = previousId === 0 ? undefined : this.classes.get(previousId);
		if (existing && existing.moduleId === moduleId) {
			Object.assign(existing, contents);
			return existing.id;
		}

		const info: ScriptClassInfo = { id: 0, moduleId, ...contents };
		info.id = this.classes.add(info);
		return info.id;
	}

	get(classId: ScriptClassId): ScriptClassInfo | undefined {
		return this.classes.get(classId);
	}

	remove(classId: ScriptClassId): boolean {
		return this.classes.remove(classId) !== undefined;
	}

	get size(): number {
		return this.classes.size;
	}

	clear(): void {
		this.classes.clear();
		this.declared = new WeakMap();
	}

	private findNativeBase(ctor: ScriptFunction): { classId: NativeClassId; ctor: ScriptFunction; prototype: unknown } | null {
		let current: unknown = Object.getPrototypeOf(ctor);
		while (isScriptFunction(current)) {
			const classId = this.nativeClasses.findByConstructor(current);
			if (classId !== 0) {
				return { classId, ctor: current, prototype: Reflect.get(current, "prototype") };
			}
			current = Object.getPrototypeOf(current);
		}
		return null;
	}

	private collectProperties(ctor: ScriptFunction, nativeCtor: ScriptFunction): Map<string, ScriptPropertyInfo> {
		const chain: ScriptFunction[] = [];
		let current: unknown = ctor;
		while (isScriptFunction(current) && current !== nativeCtor) {
			chain.unshift(current);
			current = Object.getPrototypeOf(current);
		}
		const properties = new Map<string, ScriptPropertyInfo>();
		for (const link of chain) {
			for (const property of this.declared.get(link) ?? []) {
				properties.set(property.name, property);
			}
		}
		return properties;
	}

	private collectMethods(prototype: object, nativePrototype: unknown): Set<string> {
		const methods = new Set<string>();
		let current: unknown = prototype;
		while (isScriptObject(current) && current !== nativePrototype) {
			for (const name of Object.getOwnPropertyNames(current)) {
				if (name === "constructor") {
					continue;
				}
				const descriptor = Object.getOwnPropertyDescriptor(current, name);
				if (descriptor && typeof descriptor.value === "function") {
					methods.add(name);
				}
			}
			current = Object.getPrototypeOf(current);
		}
		return methods;
	}
}
