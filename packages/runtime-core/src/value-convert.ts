import type { ScriptEngine } from "./engine";
import type { HostObject } from "./host-object";
import { array, bool, dictionary, float, int, nil, object, str, type HostValue, type HostValueType } from "./host-value";

export type ConvertResult<T> = { ok: true; value: T } | { ok: false; reason: string };

const MAX_DEPTH = 64;

/**
 * Link between host objects and their script wrappers
 */
export interface HostObjectBridge {
	/** Script wrapper for a host object, binding it on first use */
	wrapHostObject(target: HostObject): object | undefined;
	/**
	 * Host object wrapped by a script object.
	 * @returns undefined when the script object is not a host wrapper
	 */
	unwrapScriptObject(target: object): HostObject | undefined;
}

function fail<T>(reason: string): ConvertResult<T> {
	return { ok: false, reason };
}

function isPlainObject(value: object): boolean {
	const proto: unknown = Object.getPrototypeOf(value);
	// Object.prototype of any realm has a null prototype
	return proto === null || (typeof proto === "object" && Object.getPrototypeOf(proto) === null);
}

/**
 * Converts values between the host and the script engine
 */
export class ValueConverter {
	constructor(
		private engine: ScriptEngine,
		private bridge: HostObjectBridge
	) {}

	toScript(value: HostValue, depth = 0): ConvertResult<unknown> {
		if (depth > MAX_DEPTH) {
			return fail("value nesting is too deep");
		}
		switch (value.type) {
			case "nil":
				return { ok: true, value: null };
			case "bool":
			case "int":
			case "float":
			case "string":
				return { ok: true, value: value.value };
			case "array": {
				const items: unknown[] = [];
				for (const item of value.value) {
					const converted = this.toScript(item, depth + 1);
					if (!converted.ok) {
						return converted;
					}
					items.push(converted.value);
				}
				return { ok: true, value: this.engine.newArray(items) };
			}
			case "dictionary": {
				const target = this.engine.newObject();
				for (const [key, item] of value.value) {
					const converted = this.toScript(item, depth + 1);
					if (!converted.ok) {
						return converted;
					}
					Reflect.set(target, key, converted.value);
				}
				return { ok: true, value: target };
			}
			case "object": {
				if (value.value === null) {
					return { ok: true, value: null };
				}
				const wrapper = this.bridge.wrapHostObject(value.value);
				if (!wrapper) {
					return fail(`host object ${value.value.address} (${value.value.className}) cannot be bound`);
				}
				return { ok: true, value: wrapper };
			}
		}
	}

	/**
	 * Convert a script value, optionally to a declared host type
	 */
	toHost(value: unknown, expected?: HostValueType): ConvertResult<HostValue> {
		const converted = this.convert(value, 0);
		if (!converted.ok || expected === undefined || converted.value.type === expected) {
			return converted;
		}
		return this.coerce(converted.value, expected);
	}

	private coerce(value: HostValue, expected: HostValueType): ConvertResult<HostValue> {
		if (value.type === "int" && expected === "float") {
			return { ok: true, value: float(value.value) };
		}
		if (value.type === "float" && expected === "int") {
			return { ok: true, value: int(value.value) };
		}
		if (value.type === "nil" && expected === "object") {
			return { ok: true, value: object(null) };
		}
		return fail(`expected ${expected}, got ${value.type}`);
	}

	private convert(value: unknown, depth: number): ConvertResult<HostValue> {
		if (depth > MAX_DEPTH) {
			return fail("value nesting is too deep");
		}
		if (value === undefined || value === null) {
			return { ok: true, value: nil };
		}
		switch (typeof value) {
			case "boolean":
				return { ok: true, value: bool(value) };
			case "number":
				return { ok: true, value: Number.isInteger(value) ? int(value) : float(value) };
			case "string":
				return { ok: true, value: str(value) };
			case "function":
				return fail("functions cannot be passed to the host");
			case "object":
				return this.convertObject(value, depth);
			default:
				return fail(`unsupported value of type ${typeof value}`);
		}
	}

	private convertObject(value: object, depth: number): ConvertResult<HostValue> {
		if (this.engine.getInternalField(value) !== undefined) {
			const host = this.bridge.unwrapScriptObject(value);
			return host ? { ok: true, value: object(host) } : fail("script object wraps a freed host object");
		}
		if (Array.isArray(value)) {
			const items: HostValue[] = [];
			for (const item of value) {
				const converted = this.convert(item, depth + 1);
				if (!converted.ok) {
					return converted;
				}
				items.push(converted.value);
			}
			return { ok: true, value: array(items) };
		}
		if (this.engine.isPromise(value)) {
			return fail("pending asynchronous result");
		}
		if (!isPlainObject(value)) {
			return fail("object is neither a host wrapper nor a plain object");
		}
		const entries = new Map<string, HostValue>();
		for (const key of Object.keys(value)) {
			const converted = this.convert(Reflect.get(value, key), depth + 1);
			if (!converted.ok) {
				return converted;
			}
			entries.set(key, converted.value);
		}
		return { ok: true, value: dictionary(entries) };
	}
}
