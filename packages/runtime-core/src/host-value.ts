import type { HostObject } from "./host-object";

/**
 * Value as the host sees it
 */
export type HostValue =
	| { type: "nil" }
	| { type: "bool"; value: boolean }
	| { type: "int"; value: number }
	| { type: "float"; value: number }
	| { type: "string"; value: string }
	| { type: "array"; value: HostValue[] }
	| { type: "dictionary"; value: Map<string, HostValue> }
	| { type: "object"; value: HostObject | null };

export type HostValueType = HostValue["type"];

const HOST_VALUE_TYPES: readonly HostValueType[] = [
	"nil",
	"bool",
	"int",
	"float",
	"string",
	"array",
	"dictionary",
	"object",
];

export function isHostValueType(value: unknown): value is HostValueType {
	return typeof value === "string" && HOST_VALUE_TYPES.some((type) => type === value);
}

export const nil: HostValue = { type: "nil" };

export function bool(value: boolean): HostValue {
	return { type: "bool", value };
}

export function int(value: number): HostValue {
	return { type: "int", value: Math.trunc(value) };
}

export function float(value: number): HostValue {
	return { type: "float", value };
}

export function str(value: string): HostValue {
	return { type: "string", value };
}

export function array(value: HostValue[]): HostValue {
	return { type: "array", value };
}

export function dictionary(entries: Record<string, HostValue> | Map<string, HostValue>): HostValue {
	return {
		type: "dictionary",
		value: entries instanceof Map ? entries : new Map(Object.entries(entries)),
	};
}

export function object(value: HostObject | null): HostValue {
	return { type: "object", value };
}

/**
 * Default value of a declared property type
 */
export function zeroValue(type: HostValueType): HostValue {
	switch (type) {
		case "nil":
			return nil;
		case "bool":
			return bool(false);
		case "int":
			return int(0);
		case "float":
			return float(0);
		case "string":
			return str("");
		case "array":
			return array([]);
		case "dictionary":
			return dictionary(new Map());
		case "object":
			return object(null);
	}
}
