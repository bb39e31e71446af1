import type { HostAddress } from "./types";

/**
 * Opaque token identifying a runtime in the environment registry
 */
export type RuntimeToken = number;

/**
 * Callbacks a host object invokes on the runtime that bound it.
 * Both carry only the token, so a callback arriving after the runtime is gone is a no-op.
 */
export interface InstanceBindingCallbacks {
	/** The host object is being deleted; drop the script-side link */
	free(token: RuntimeToken, address: HostAddress): void;
	/**
	 * Host refcount changed.
	 * @returns true when the host object may delete itself
	 */
	reference(token: RuntimeToken, address: HostAddress, increment: boolean): boolean;
}

/**
 * Object of the host's own object model, identified by a stable address
 */
export interface HostObject {
	readonly address: HostAddress;
	/** Name of the native class the object is an instance of */
	readonly className: string;
	attachInstanceBinding(token: RuntimeToken, callbacks: InstanceBindingCallbacks): void;
	detachInstanceBinding(token: RuntimeToken): void;
}

/**
 * Host object with intrusive reference counting
 */
export interface RefCountedHostObject extends HostObject {
	readonly refCounted: true;
	/**
	 * Acquire the reference held on behalf of a script binding
	 * @returns false when the object is already dead
	 */
	initRef(): boolean;
	reference(): void;
	/**
	 * @returns true when the count reached zero and the object should be deleted
	 */
	unreference(): boolean;
	getReferenceCount(): number;
}

export function isRefCounted(object: HostObject): object is RefCountedHostObject {
	return "refCounted" in object && object.refCounted === true;
}

/**
 * Maps addresses back to live host objects
 */
export interface HostObjectResolver {
	resolve(address: HostAddress): HostObject | undefined;
}
