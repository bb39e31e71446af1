import { CROSS_BIND, DEFAULT_OBJECT, decodeConstructReason } from "../classes/construct-reason";
import type { ScriptClassTable } from "../classes/script-class";
import { isScriptFunction, type ScriptEngine } from "../engine";
import { isHostValueType } from "../host-value";
import type { NativeClassId } from "../types";
import type { JavaScriptModule } from "./javascript-module";
import type { ModuleHost, ModuleLoader } from "./module-resolver";

/** Module id of the bridge helpers available to every script */
export const BRIDGE_MODULE_ID = "hostscript";

/** Module id exposing native classes by name */
export const NATIVE_MODULE_ID = "host";

/**
 * Exposes construct-reason sentinels and property declaration to scripts:
 *
 * ```js
 * const { exportProperty, constructReason } = require("hostscript");
 * class Player extends Node {}
 * exportProperty(Player, "speed", "float");
 * ```
 */
export class BridgeModuleLoader implements ModuleLoader {
	constructor(
		private engine: ScriptEngine,
		private scriptClasses: ScriptClassTable
	) {}

	load(_host: ModuleHost, module: JavaScriptModule): boolean {
		const exports = module.exportsObject;
		const { engine, scriptClasses } = this;
		Reflect.set(exports, "crossBind", CROSS_BIND);
		Reflect.set(exports, "defaultObject", DEFAULT_OBJECT);
		Reflect.set(
			exports,
			"constructReason",
			engine.newFunction("constructReason", (_self, args) => decodeConstructReason(args[0]))
		);
		Reflect.set(
			exports,
			"exportProperty",
			engine.newFunction("exportProperty", (_self, args) => {
				const [ctor, name, type] = args;
				if (!isScriptFunction(ctor)) {
					throw engine.newError("exportProperty: first argument must be a class");
				}
				if (typeof name !== "string" || name === "") {
					throw engine.newError("exportProperty: property name must be a non-empty string");
				}
				if (!isHostValueType(type)) {
					throw engine.newError(`exportProperty: unknown property type ${String(type)}`);
				}
				scriptClasses.declareProperty(ctor, name, type);
				return undefined;
			})
		);
		return true;
	}
}

export interface NativeClassExposer {
	/** Registered and on-demand class names */
	names(): string[];
	/** Register (if needed) and return the class id, or 0 */
	exposeClass(name: string): NativeClassId;
	getConstructor(classId: NativeClassId): unknown;
}

/**
 * Exposes native classes as lazily registered exports of the "host" module
 */
export class NativeModuleLoader implements ModuleLoader {
	constructor(private classes: NativeClassExposer) {}

	load(host: ModuleHost, module: JavaScriptModule): boolean {
		const { classes } = this;
		for (const name of classes.names()) {
			Object.defineProperty(module.exportsObject, name, {
				enumerable: true,
				configurable: true,
				get() {
					const classId = classes.exposeClass(name);
					if (classId === 0) {
						host.logger.error(`[NativeModuleLoader] Failed to expose native class ${name}`);
						return undefined;
					}
					return classes.getConstructor(classId);
				},
			});
		}
		return true;
	}
}
