import {
	isRefCounted,
	type HostAddress,
	type HostObject,
	type HostObjectResolver,
	type HostValue,
	type InstanceBindingCallbacks,
	type NativeClassDefinition,
	type NativeClassId,
	type NativeFinalizer,
	type RefCountedHostObject,
	type Runtime,
	type RuntimeToken,
} from "@hostscript/runtime-core";

/**
 * Host object owned by a HostObjectDatabase.
 * Keeps named fields so native methods have somewhere to store state.
 */
export class BasicHostObject implements HostObject {
	readonly fields = new Map<string, HostValue>();
	protected bindings = new Map<RuntimeToken, InstanceBindingCallbacks>();
	private deleted = false;

	constructor(
		public readonly address: HostAddress,
		public readonly className: string
	) {}

	get isDeleted(): boolean {
		return this.deleted;
	}

	get bindingCount(): number {
		return this.bindings.size;
	}

	attachInstanceBinding(token: RuntimeToken, callbacks: InstanceBindingCallbacks): void {
		this.bindings.set(token, callbacks);
	}

	detachInstanceBinding(token: RuntimeToken): void {
		this.bindings.delete(token);
	}

	/**
	 * Tell every runtime holding a binding that the object is going away
	 */
	notifyDeleted(): void {
		for (const [token, callbacks] of [...this.bindings]) {
			callbacks.free(token, this.address);
		}
		this.bindings.clear();
		this.deleted = true;
	}
}

/**
 * Host object with an intrusive reference count.
 * The reference taken by `initRef()` belongs to the script binding. Every change past that
 * one is reported to the bindings, which switch between weak and strong accordingly.
 */
export class RefCountedObject extends BasicHostObject implements RefCountedHostObject {
	readonly refCounted = true;
	private count = 0;

	initRef(): boolean {
		if (this.isDeleted) {
			return false;
		}
		this.count++;
		return true;
	}

	reference(): void {
		this.count++;
		if (this.count >= 2) {
			this.notifyReference(true);
		}
	}

	/**
	 * @returns true when the count reached zero
	 */
	unreference(): boolean {
		this.count--;
		if (this.count >= 1) {
			this.notifyReference(false);
		}
		return this.count === 0;
	}

	getReferenceCount(): number {
		return this.count;
	}

	private notifyReference(increment: boolean): void {
		for (const [token, callbacks] of [...this.bindings]) {
			callbacks.reference(token, this.address, increment);
		}
	}
}

export type HostClassDefinition = Omit<NativeClassDefinition, "finalizer" | "factory"> & {
	/** Let script code create instances with `new`; refcounted unless "plain" */
	instantiable?: "refcounted" | "plain";
};

/**
 * Owns the host objects of a process and hands out their addresses
 */
export class HostObjectDatabase implements HostObjectResolver {
	private objects = new Map<HostAddress, BasicHostObject>();
	private nextAddress = 0x1000;

	create(className: string): BasicHostObject {
		return this.insert(new BasicHostObject(this.allocate(), className));
	}

	createRefCounted(className: string): RefCountedObject {
		return this.insert(new RefCountedObject(this.allocate(), className));
	}

	resolve(address: HostAddress): HostObject | undefined {
		return this.objects.get(address);
	}

	get(address: HostAddress): BasicHostObject | undefined {
		return this.objects.get(address);
	}

	has(address: HostAddress): boolean {
		return this.objects.has(address);
	}

	/**
	 * Delete an object; every runtime that bound it is told to drop the binding
	 */
	delete(address: HostAddress): boolean {
		const object = this.objects.get(address);
		if (!object) {
			return false;
		}
		this.objects.delete(address);
		object.notifyDeleted();
		return true;
	}

	/**
	 * Host side of a reference change on a refcounted object
	 * @returns true when the object was deleted
	 */
	unreference(address: HostAddress): boolean {
		const object = this.objects.get(address);
		if (!(object instanceof RefCountedObject)) {
			return false;
		}
		if (object.unreference()) {
			this.delete(address);
			return true;
		}
		return false;
	}

	/**
	 * Finalizer for classes whose objects live in this database.
	 * Refcounted objects lose the binding's reference and are deleted when nothing else holds them;
	 * persistent bindings never held one. Other objects are deleted outright.
	 */
	finalizer(): NativeFinalizer {
		return (_runtime, address, isPersistent) => {
			const object = this.objects.get(address);
			if (!object) {
				return;
			}
			if (isRefCounted(object)) {
				if (!isPersistent && object.unreference()) {
					this.delete(address);
				}
				return;
			}
			this.delete(address);
		};
	}

	/**
	 * Register a native class whose instances live in this database
	 */
	registerClass(runtime: Runtime, definition: HostClassDefinition): NativeClassId {
		const { instantiable, ...rest } = definition;
		let factory: (() => HostObject) | undefined;
		if (instantiable === "refcounted") {
			factory = () => this.createRefCounted(definition.name);
		} else if (instantiable === "plain") {
			factory = () => this.create(definition.name);
		}
		return runtime.registerNativeClass({ ...rest, factory, finalizer: this.finalizer() });
	}

	get size(): number {
		return this.objects.size;
	}

	private insert<T extends BasicHostObject>(object: T): T {
		this.objects.set(object.address, object);
		return object;
	}

	private allocate(): HostAddress {
		const address = this.nextAddress;
		this.nextAddress += 0x10;
		return address;
	}
}
