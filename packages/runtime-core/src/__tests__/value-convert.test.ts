import { describe, it, expect, beforeEach } from "vitest";
import { array, bool, dictionary, float, int, nil, object, str } from "../host-value";
import { ValueConverter } from "../value-convert";
import { FakeScriptEngine, MockHostDatabase } from "./test-helpers";

describe("ValueConverter - Desired Behavior", () => {
	let engine: FakeScriptEngine;
	let hosts: MockHostDatabase;
	let converter: ValueConverter;

	beforeEach(() => {
		engine = new FakeScriptEngine();
		hosts = new MockHostDatabase();
		converter = new ValueConverter(engine, {
			wrapHostObject: (target) => {
				if (target.className === "Unbindable") {
					return undefined;
				}
				const wrapper = {};
				engine.setInternalField(wrapper, target.address);
				return wrapper;
			},
			unwrapScriptObject: (target) => {
				const address = engine.getInternalField(target);
				return address === undefined ? undefined : hosts.resolve(address);
			},
		});
	});

	describe("Host to Script Contract", () => {
		it("should convert primitives", () => {
			expect(converter.toScript(nil)).toEqual({ ok: true, value: null });
			expect(converter.toScript(bool(true))).toEqual({ ok: true, value: true });
			expect(converter.toScript(int(7))).toEqual({ ok: true, value: 7 });
			expect(converter.toScript(float(0.5))).toEqual({ ok: true, value: 0.5 });
			expect(converter.toScript(str("hi"))).toEqual({ ok: true, value: "hi" });
		});

		it("should convert containers recursively", () => {
			const value = dictionary({ list: array([int(1), str("two")]), empty: nil });

			expect(converter.toScript(value)).toEqual({ ok: true, value: { list: [1, "two"], empty: null } });
		});

		it("should wrap host objects through the bridge", () => {
			const host = hosts.create("Node");
			const converted = converter.toScript(object(host));

			expect(converted.ok).toBe(true);
			if (converted.ok && typeof converted.value === "object" && converted.value !== null) {
				expect(engine.getInternalField(converted.value)).toBe(host.address);
			}
			expect(converter.toScript(object(null))).toEqual({ ok: true, value: null });
		});

		it("should fail when a host object cannot be bound", () => {
			const host = hosts.create("Unbindable");

			expect(converter.toScript(array([object(host)]))).toEqual({
				ok: false,
				reason: `host object ${host.address} (Unbindable) cannot be bound`,
			});
		});
	});

	describe("Script to Host Contract", () => {
		it("should convert primitives and missing values", () => {
			expect(converter.toHost(undefined)).toEqual({ ok: true, value: nil });
			expect(converter.toHost(null)).toEqual({ ok: true, value: nil });
			expect(converter.toHost(false)).toEqual({ ok: true, value: bool(false) });
			expect(converter.toHost(3)).toEqual({ ok: true, value: int(3) });
			expect(converter.toHost(1.5)).toEqual({ ok: true, value: float(1.5) });
			expect(converter.toHost("text")).toEqual({ ok: true, value: str("text") });
		});

		it("should convert arrays and plain objects", () => {
			expect(converter.toHost([1, "a", [true]])).toEqual({
				ok: true,
				value: array([int(1), str("a"), array([bool(true)])]),
			});
			expect(converter.toHost({ x: 1, y: 2.5 })).toEqual({
				ok: true,
				value: dictionary({ x: int(1), y: float(2.5) }),
			});
			expect(converter.toHost(Object.create(null))).toEqual({ ok: true, value: dictionary({}) });
		});

		it("should unwrap host wrappers", () => {
			const host = hosts.create("Node");
			const wrapper = {};
			engine.setInternalField(wrapper, host.address);

			expect(converter.toHost(wrapper)).toEqual({ ok: true, value: object(host) });
		});

		it("should fail on a wrapper whose host object is gone", () => {
			const wrapper = {};
			engine.setInternalField(wrapper, 0x9999);

			expect(converter.toHost(wrapper)).toEqual({ ok: false, reason: "script object wraps a freed host object" });
		});

		it("should refuse functions, promises and class instances", () => {
			expect(converter.toHost(() => 1)).toEqual({ ok: false, reason: "functions cannot be passed to the host" });
			expect(converter.toHost(Promise.resolve(1))).toEqual({ ok: false, reason: "pending asynchronous result" });
			expect(converter.toHost(new Date(0))).toEqual({
				ok: false,
				reason: "object is neither a host wrapper nor a plain object",
			});
		});

		it("should refuse values nested too deeply", () => {
			let value: unknown = 1;
			for (let i = 0; i < 70; i++) {
				value = [value];
			}

			expect(converter.toHost(value)).toEqual({ ok: false, reason: "value nesting is too deep" });
		});
	});

	describe("Declared Type Contract", () => {
		it("should coerce between numeric types", () => {
			expect(converter.toHost(3, "float")).toEqual({ ok: true, value: float(3) });
			expect(converter.toHost(2.7, "int")).toEqual({ ok: true, value: int(2) });
		});

		it("should accept null for object properties", () => {
			expect(converter.toHost(null, "object")).toEqual({ ok: true, value: object(null) });
		});

		it("should reject mismatched types", () => {
			expect(converter.toHost(3, "string")).toEqual({ ok: false, reason: "expected string, got int" });
		});
	});
});
