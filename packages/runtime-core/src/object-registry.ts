import type { PersistentHandle, ScriptEngine } from "./engine";
import { EmbedError } from "./errors";
import type { DebugChecks } from "./internal/debug-checks";
import { SlotTable } from "./internal/slot-table";
import type { HostAddress, Logger, NativeClassId, ObjectId } from "./types";

/**
 * Who owns the lifetime of a binding.
 * - managed: the engine; the handle starts weak and is collected under GC pressure
 * - external: the host; the handle starts strong with a reference count of one
 */
export type BindingPolicy = "managed" | "external";

export type HandleState = "weak" | "strong" | "finalizing";

export interface ObjectHandle {
	readonly classId: NativeClassId;
	readonly address: HostAddress;
	readonly handle: PersistentHandle<object>;
	refCount: number;
	state: HandleState;
}

/**
 * What the registry needs to know about native classes
 */
export interface NativeClassLookup {
	has(classId: NativeClassId): boolean;
	isValueType(classId: NativeClassId): boolean;
	getName(classId: NativeClassId): string;
}

export interface ObjectRegistryOptions {
	engine: ScriptEngine;
	logger: Logger;
	checks: DebugChecks;
	classes: NativeClassLookup;
	/** Invoked from the engine's weak callback once the script side of a binding has been collected */
	onCollected: (address: HostAddress) => void;
	/** Class finalizer, invoked only when a binding is freed with `finalize` */
	finalize: (classId: NativeClassId, address: HostAddress, isPersistent: boolean) => void;
}

/**
 * Two-way map between host addresses and script objects.
 *
 * Every binding moves through `weak ⇄ strong → finalizing → gone`. Weak and strong are switched
 * only by `reference()`. The address index is always erased before a binding is torn down,
 * so a free that re-enters from a finalizer sees an unknown pointer and returns.
 */
export class ObjectRegistry {
	private objects = new SlotTable<ObjectHandle>();
	private index = new Map<HostAddress, ObjectId>();
	private persistent = new Set<HostAddress>();

	constructor(private options: ObjectRegistryOptions) {}

	/**
	 * Bind a host address to a script object
	 * @throws EmbedError ClassNotRegistered | DuplicateBinding
	 */
	bind(classId: NativeClassId, address: HostAddress, target: object, policy: BindingPolicy): ObjectId {
		const { engine, checks, classes } = this.options;
		if (!classes.has(classId)) {
			throw new EmbedError(`Native class ${classId} is not registered`, "ClassNotRegistered", { classId });
		}
		checks.check(!classes.isValueType(classId), () => `Cannot bind value type class ${classes.getName(classId)}`);
		if (this.index.has(address)) {
			throw new EmbedError(`Host object ${address} is already bound`, "DuplicateBinding", {
				address,
				objectId: this.index.get(address),
			});
		}

		const entry: ObjectHandle = {
			classId,
			address,
			handle: engine.newPersistent(target),
			refCount: policy === "external" ? 1 : 0,
			state: policy === "external" ? "strong" : "weak",
		};
		if (policy === "managed") {
			this.makeWeak(entry);
		}
		const objectId = this.objects.add(entry);
		this.index.set(address, objectId);
		engine.setInternalField(target, address);

		this.checkCardinality();
		return objectId;
	}

	/**
	 * Bridge a host refcount change into the weak/strong state machine.
	 * @returns true when the host object may free itself (the address is not bound),
	 * false when the binding will free it once the engine collects the script side
	 */
	reference(address: HostAddress, increment: boolean): boolean {
		const objectId = this.index.get(address);
		if (objectId === undefined) {
			if (!increment) {
				this.options.logger.debug(`[ObjectRegistry] Reference decrement on unknown pointer ${address}`);
			}
			return true;
		}
		const entry = this.getEntry(objectId);
		this.options.checks.check(entry.state !== "finalizing", () => `Reference on finalizing object ${address}`);

		if (increment) {
			if (entry.refCount === 0) {
				entry.handle.clearWeak();
				entry.state = "strong";
			}
			entry.refCount++;
			return false;
		}

		if (entry.refCount === 0) {
			this.options.logger.warn(`[ObjectRegistry] Reference count of ${address} is already zero`);
			return false;
		}
		entry.refCount--;
		if (entry.refCount === 0) {
			this.makeWeak(entry);
		}
		return false;
	}

	/**
	 * Keep a binding strong until the runtime is destroyed
	 */
	markPersistent(address: HostAddress): boolean {
		if (!this.index.has(address)) {
			this.options.logger.error(`[ObjectRegistry] Cannot mark unbound object ${address} as persistent`);
			return false;
		}
		if (this.persistent.has(address)) {
			return true;
		}
		this.persistent.add(address);
		this.reference(address, true);
		return true;
	}

	/**
	 * Tear down a binding.
	 * @param finalize true when the engine collected the script side (or the runtime is tearing down):
	 * the class finalizer runs. false when the host is deleting the object itself: only the link is dropped.
	 */
	free(address: HostAddress, finalize: boolean): void {
		const objectId = this.index.get(address);
		if (objectId === undefined) {
			return;
		}
		this.index.delete(address);
		const isPersistent = this.persistent.delete(address);

		const entry = this.getEntry(objectId);
		this.options.checks.check(entry.address === address, () => `Binding ${objectId} does not belong to ${address}`);
		entry.state = "finalizing";

		if (!finalize) {
			const target = entry.handle.get();
			if (target) {
				this.options.engine.setInternalField(target, undefined);
			}
		}
		entry.handle.reset();
		this.objects.remove(objectId);
		this.checkCardinality();

		if (finalize) {
			this.options.finalize(entry.classId, address, isPersistent);
		}
	}

	/**
	 * Finalize every remaining binding
	 */
	freeAll(): void {
		for (let objectId = this.objects.firstId(); objectId !== undefined; objectId = this.objects.firstId()) {
			this.free(this.getEntry(objectId).address, true);
		}
		this.persistent.clear();
	}

	getObjectId(address: HostAddress): ObjectId {
		return this.index.get(address) ?? 0;
	}

	getObject(objectId: ObjectId): object | undefined {
		return this.objects.get(objectId)?.handle.get();
	}

	tryGetObject(address: HostAddress): object | undefined {
		const objectId = this.index.get(address);
		return objectId === undefined ? undefined : this.getObject(objectId);
	}

	getHandle(objectId: ObjectId): Readonly<ObjectHandle> | undefined {
		return this.objects.get(objectId);
	}

	isValid(objectId: ObjectId): boolean {
		return this.objects.isValid(objectId);
	}

	isPersistent(address: HostAddress): boolean {
		return this.persistent.has(address);
	}

	get size(): number {
		return this.objects.size;
	}

	get indexSize(): number {
		return this.index.size;
	}

	get persistentCount(): number {
		return this.persistent.size;
	}

	private makeWeak(entry: ObjectHandle): void {
		const { address } = entry;
		entry.state = "weak";
		entry.handle.setWeak(() => this.options.onCollected(address));
	}

	private getEntry(objectId: ObjectId): ObjectHandle {
		const entry = this.objects.get(objectId);
		if (!entry) {
			throw new EmbedError(`Object ${objectId} is not bound`, "UnknownPointer", { objectId });
		}
		return entry;
	}

	private checkCardinality(): void {
		this.options.checks.check(
			this.index.size === this.objects.size,
			() => `Registry out of sync: ${this.index.size} addresses, ${this.objects.size} handles`
		);
	}
}
