/**
 * Why a script class constructor is running.
 * - construct: plain `new` from script
 * - default-object: building the instance used to read default property values
 * - cross-bind: attaching the class to an existing host object
 */
export type ConstructReason = "construct" | "default-object" | "cross-bind";

/** Passed as the first constructor argument for a cross-bind */
export const CROSS_BIND = Symbol("hostscript.crossBind");

/** Passed as the first constructor argument when building a default object */
export const DEFAULT_OBJECT = Symbol("hostscript.defaultObject");

export function constructArgument(reason: Exclude<ConstructReason, "construct">): symbol {
	return reason === "cross-bind" ? CROSS_BIND : DEFAULT_OBJECT;
}

export function decodeConstructReason(firstArgument: unknown): ConstructReason {
	if (firstArgument === CROSS_BIND) {
		return "cross-bind";
	}
	if (firstArgument === DEFAULT_OBJECT) {
		return "default-object";
	}
	return "construct";
}
