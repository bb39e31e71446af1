import { isScriptFunction, type ScriptFunction } from "../engine";
import type { HostObject } from "../host-object";
import type { HostValue } from "../host-value";
import type { NativeClassLookup } from "../object-registry";
import { SlotTable } from "../internal/slot-table";
import type { HostAddress, NativeClassId } from "../types";
import type { Runtime } from "../runtime";

/**
 * "object" classes wrap a host identity object; "value" classes have no host counterpart
 */
export type NativeClassKind = "object" | "value";

/**
 * Runs when a binding of this class is finalized
 */
export type NativeFinalizer = (runtime: Runtime, address: HostAddress, isPersistent: boolean) => void;

/**
 * Host method exposed on the class prototype
 */
export type NativeMethod = (self: HostObject, args: HostValue[]) => HostValue;

export interface NativeClassDefinition {
	name: string;
	kind?: NativeClassKind;
	finalizer?: NativeFinalizer;
	/** Creates the host object when script code calls `new` */
	factory?: () => HostObject;
	methods?: Record<string, NativeMethod>;
}

export interface NativeClassInfo {
	id: NativeClassId;
	readonly name: string;
	readonly kind: NativeClassKind;
	readonly finalizer: NativeFinalizer;
	readonly factory?: () => HostObject;
	readonly methods: Readonly<Record<string, NativeMethod>>;
	/** Script-side constructor, filled in by the runtime right after registration */
	scriptConstructor?: ScriptFunction;
}

/**
 * Registers a native class on demand
 */
export type ClassRegister = (runtime: Runtime) => NativeClassId;

const noopFinalizer: NativeFinalizer = () => {};

/**
 * Native classes known to a runtime. Entries are immutable after registration
 * and only removed when the runtime is destroyed.
 */
export class NativeClassTable implements NativeClassLookup {
	private classes = new SlotTable<NativeClassInfo>();
	private byName = new Map<string, NativeClassId>();
	private byConstructor = new WeakMap<ScriptFunction, NativeClassId>();
	private registers = new Map<string, ClassRegister>();

	/**
	 * @throws Error when a class with the same name exists
	 */
	add(definition: NativeClassDefinition): NativeClassInfo {
		if (this.byName.has(definition.name)) {
			throw new Error(`Native class ${definition.name} is already registered`);
		}
		const info: NativeClassInfo = {
			id: 0,
			name: definition.name,
			kind: definition.kind ?? "object",
			finalizer: definition.finalizer ?? noopFinalizer,
			factory: definition.factory,
			methods: definition.methods ?? {},
		};
		info.id = this.classes.add(info);
		this.byName.set(info.name, info.id);
		return info;
	}

	setConstructor(classId: NativeClassId, ctor: ScriptFunction): void {
		const info = this.classes.get(classId);
		if (!info) {
			throw new Error(`Native class ${classId} is not registered`);
		}
		info.scriptConstructor = ctor;
		this.byConstructor.set(ctor, classId);
	}

	get(classId: NativeClassId): NativeClassInfo | undefined {
		return this.classes.get(classId);
	}

	findByName(name: string): NativeClassId {
		return this.byName.get(name) ?? 0;
	}

	findByConstructor(ctor: unknown): NativeClassId {
		return isScriptFunction(ctor) ? (this.byConstructor.get(ctor) ?? 0) : 0;
	}

	has(classId: NativeClassId): boolean {
		return this.classes.isValid(classId);
	}

	isValueType(classId: NativeClassId): boolean {
		return this.classes.get(classId)?.kind === "value";
	}

	getName(classId: NativeClassId): string {
		return this.classes.get(classId)?.name ?? `<unknown class ${classId}>`;
	}

	defineRegister(name: string, register: ClassRegister): void {
		this.registers.set(name, register);
	}

	takeRegister(name: string): ClassRegister | undefined {
		const register = this.registers.get(name);
		this.registers.delete(name);
		return register;
	}

	/** Names that are registered or can be registered on demand */
	names(): string[] {
		return [...new Set([...this.byName.keys(), ...this.registers.keys()])];
	}

	get size(): number {
		return this.classes.size;
	}

	clear(): void {
		this.classes.clear();
		this.byName.clear();
		this.byConstructor = new WeakMap();
		this.registers.clear();
	}
}
