import type { CallResult } from "./call-bridge";
import { CallBridge } from "./call-bridge";
import { CROSS_BIND, DEFAULT_OBJECT, decodeConstructReason } from "./classes/construct-reason";
import {
	NativeClassTable,
	type ClassRegister,
	type NativeClassDefinition,
	type NativeClassInfo,
	type NativeMethod,
} from "./classes/native-class";
import { ScriptClassTable, type ScriptClassInfo, type ScriptPropertyInfo } from "./classes/script-class";
import {
	isScriptFunction,
	isScriptObject,
	type HeapStatistics,
	type ScriptEngine,
	type ScriptEngineProvider,
	type ScriptFunction,
} from "./engine";
import { EnvironmentRegistry } from "./environment-registry";
import { EmbedError, InvariantViolation, isEmbedError, type ErrorCode, type HostStatus } from "./errors";
import { formatException, tryCatch } from "./exception-scope";
import {
	isRefCounted,
	type HostObject,
	type HostObjectResolver,
	type InstanceBindingCallbacks,
	type RuntimeToken,
} from "./host-object";
import { nil, zeroValue, type HostValue } from "./host-value";
import { Inbox, type InboxMessage } from "./inbox";
import { DebugChecks } from "./internal/debug-checks";
import { combine, dirname, isRelativeId } from "./internal/path-util";
import { RingBuffer } from "./internal/ring-buffer";
import { BridgeModuleLoader, BRIDGE_MODULE_ID, NativeModuleLoader, NATIVE_MODULE_ID } from "./modules/builtin-modules";
import { JavaScriptModule } from "./modules/javascript-module";
import { ModuleCache } from "./modules/module-cache";
import {
	DefaultModuleResolver,
	type ModuleHost,
	type ModuleLoader,
	type ModuleResolver,
	type SourceTransformer,
} from "./modules/module-resolver";
import { FunctionCache } from "./function-cache";
import { ObjectRegistry, type BindingPolicy } from "./object-registry";
import type {
	FunctionId,
	HostAddress,
	Logger,
	NativeClassId,
	ObjectId,
	PathUtils,
	Releasable,
	ScriptClassId,
	SourceHost,
} from "./types";
import { ValueConverter } from "./value-convert";

/**
 * Default capacity of the deferred-deletion queue
 */
export const DEFAULT_DELETION_QUEUE_SIZE = 64;

/**
 * Where path-based modules come from
 */
export interface RuntimeSources {
	host: SourceHost;
	pathUtils: PathUtils;
	transformer?: SourceTransformer;
	/** Directories searched in order; defaults to the source root only */
	searchPaths?: string[];
}

export interface RuntimeParams {
	engineProvider: ScriptEngineProvider;
	logger: Logger;
	hostObjects: HostObjectResolver;
	/** Installs the default module resolver on init() */
	sources?: RuntimeSources;
	deletionQueueSize?: number;
	/** Assert thread affinity and registry invariants (default true) */
	debugChecks?: boolean;
	/** Id of the calling thread; the value at construction is the owning thread */
	threadId?: () => number;
	name?: string;
}

export type RuntimeState = "alive" | "disposing" | "disposed" | "destroyed";

export type ReloadStatus = "NoSuchModule" | "NoChanges" | "Requested";

export interface LoadResult {
	status: HostStatus;
	module: JavaScriptModule | null;
}

export interface EvalResult {
	status: HostStatus;
	value: HostValue;
}

export interface RuntimeStatistics {
	objects: number;
	persistentObjects: number;
	nativeClasses: number;
	scriptClasses: number;
	modules: number;
	functions: number;
	pendingDeletions: number;
	pendingMessages: number;
	heap: HeapStatistics;
}

const environments = new EnvironmentRegistry<Runtime>();

const instanceBindingCallbacks: InstanceBindingCallbacks = {
	free(token, address) {
		environments.access(token)?.freeObject(address, false);
	},
	reference(token, address, increment) {
		const runtime = environments.access(token);
		return runtime ? runtime.referenceObject(address, increment) : true;
	},
};

/**
 * One script engine instance plus everything bound to it: object bindings, modules,
 * cached functions and class tables.
 *
 * Lifecycle: `create()` → `init()` → load/bind/call, `update()` periodically → `dispose()` → `destroy()`.
 * Everything except the environment registry lookups must run on the owning thread.
 */
export class Runtime implements ModuleHost {
	readonly token: RuntimeToken;
	readonly engine: ScriptEngine;
	readonly logger: Logger;

	private checks: DebugChecks;
	private threadId: () => number;
	private owningThread: number;
	private lifecycle: RuntimeState = "alive";
	private initialized = false;

	private hostObjects: HostObjectResolver;
	private sources?: RuntimeSources;
	private registry: ObjectRegistry;
	private functionCache: FunctionCache;
	private nativeClasses = new NativeClassTable();
	private scriptClasses: ScriptClassTable;
	private converter: ValueConverter;
	private callBridge: CallBridge;
	private moduleCache: ModuleCache;
	private resolvers: ModuleResolver[] = [];
	private loaders = new Map<string, ModuleLoader>();
	private inbox = new Inbox();
	private deletionQueue: RingBuffer<Releasable>;

	private constructor(params: RuntimeParams) {
		this.logger = params.logger;
		this.hostObjects = params.hostObjects;
		this.sources = params.sources;
		this.checks = new DebugChecks(params.debugChecks ?? true);
		this.threadId = params.threadId ?? (() => 0);
		this.owningThread = this.threadId();
		this.token = environments.allocateToken();

		this.engine = params.engineProvider.createEngine({ name: params.name });
		this.engine.setEmbedderData(this.token);

		const token = this.token;
		this.scriptClasses = new ScriptClassTable(this.nativeClasses);
		this.registry = new ObjectRegistry({
			engine: this.engine,
			logger: this.logger,
			checks: this.checks,
			classes: this.nativeClasses,
			onCollected: (address) => environments.access(token)?.freeObject(address, true),
			finalize: (classId, address, isPersistent) => this.runFinalizer(classId, address, isPersistent),
		});
		this.functionCache = new FunctionCache(this.engine, this.checks);
		this.converter = new ValueConverter(this.engine, {
			wrapHostObject: (target) => this.wrapHostObject(target),
			unwrapScriptObject: (target) => this.unwrapScriptObject(target),
		});
		this.callBridge = new CallBridge(this.engine, this.converter, this.logger);
		this.deletionQueue = new RingBuffer(params.deletionQueueSize ?? DEFAULT_DELETION_QUEUE_SIZE);

		this.moduleCache = new ModuleCache(this.engine.newObject());
		this.engine.setGlobal("require", this.createRequire(""));
		this.addModuleLoader(BRIDGE_MODULE_ID, new BridgeModuleLoader(this.engine, this.scriptClasses));
		this.addModuleLoader(
			NATIVE_MODULE_ID,
			new NativeModuleLoader({
				names: () => this.nativeClasses.names(),
				exposeClass: (name) => this.exposeClass(name),
				getConstructor: (classId) => this.nativeClasses.get(classId)?.scriptConstructor,
			})
		);
	}

	/**
	 * Create a runtime and register it in the environment registry
	 */
	static create(params: RuntimeParams): Runtime {
		const runtime = new Runtime(params);
		environments.add(runtime);
		return runtime;
	}

	/**
	 * Live runtime for a token; undefined once it is tearing down
	 */
	static access(token: RuntimeToken | undefined): Runtime | undefined {
		return environments.access(token);
	}

	/**
	 * Registered runtime for a token, even while it is tearing down
	 */
	static unsafeAccess(token: RuntimeToken | undefined): Runtime | undefined {
		return environments.unsafeAccess(token);
	}

	get state(): RuntimeState {
		return this.lifecycle;
	}

	isTearingDown(): boolean {
		return this.lifecycle !== "alive";
	}

	/**
	 * Install the default module resolver
	 */
	init(): void {
		this.checkThread();
		if (this.initialized) {
			return;
		}
		this.initialized = true;
		if (this.sources) {
			this.addModuleResolver(
				new DefaultModuleResolver({
					sourceHost: this.sources.host,
					pathUtils: this.sources.pathUtils,
					transformer: this.sources.transformer,
					searchPaths: this.sources.searchPaths,
				})
			);
		}
	}

	addModuleResolver(resolver: ModuleResolver): void {
		this.resolvers.push(resolver);
	}

	addModuleLoader(moduleId: string, loader: ModuleLoader): void {
		this.loaders.set(moduleId, loader);
	}

	registerNativeClass(definition: NativeClassDefinition): NativeClassId {
		this.checkThread();
		const info = this.nativeClasses.add(definition);
		this.nativeClasses.setConstructor(info.id, this.createNativeConstructor(info));
		return info.id;
	}

	/**
	 * Register a class lazily, the first time it is exposed
	 */
	defineClassRegister(name: string, register: ClassRegister): void {
		this.nativeClasses.defineRegister(name, register);
	}

	/**
	 * Id of a native class by name, running its deferred register if needed
	 * @returns 0 when no such class is known
	 */
	exposeClass(name: string): NativeClassId {
		const existing = this.nativeClasses.findByName(name);
		if (existing !== 0) {
			return existing;
		}
		const register = this.nativeClasses.takeRegister(name);
		return register ? register(this) : 0;
	}

	getNativeClass(classId: NativeClassId): NativeClassInfo | undefined {
		return this.nativeClasses.get(classId);
	}

	/**
	 * Bind a host address to a script object
	 * @throws EmbedError DuplicateBinding | ClassNotRegistered
	 */
	bindObject(classId: NativeClassId, address: HostAddress, target: object, policy: BindingPolicy): ObjectId {
		this.checkThread();
		return this.registry.bind(classId, address, target, policy);
	}

	/**
	 * Bind a host object, creating its script wrapper unless one is given.
	 * Refcounted objects get `initRef()` first. Without an explicit policy, a refcounted object nobody
	 * references yet is managed by the engine; anything else is owned by the host.
	 * @returns the object id, or 0 when the object cannot be bound
	 */
	bindHostObject(host: HostObject, target?: object, policy?: BindingPolicy): ObjectId {
		this.checkThread();
		const classId = this.exposeClass(host.className);
		if (classId === 0) {
			this.logger.error(`[Runtime] Native class ${host.className} is not registered`);
			return 0;
		}
		if (this.registry.getObjectId(host.address) !== 0) {
			this.logger.error(`[Runtime] Host object ${host.address} is already bound`);
			return 0;
		}
		const wrapper = target ?? this.newWrapper(classId);
		if (!wrapper) {
			this.logger.error(`[Runtime] Cannot create a script wrapper for ${host.className}`);
			return 0;
		}

		let effectivePolicy: BindingPolicy = policy ?? "external";
		if (isRefCounted(host)) {
			if (!policy) {
				effectivePolicy = host.getReferenceCount() === 0 ? "managed" : "external";
			}
			if (!host.initRef()) {
				this.logger.error(`[Runtime] Can not bind a dead object ${host.address}`);
				return 0;
			}
		}

		const objectId = this.registry.bind(classId, host.address, wrapper, effectivePolicy);
		host.attachInstanceBinding(this.token, instanceBindingCallbacks);
		return objectId;
	}

	/**
	 * @returns true when the host object may free itself
	 */
	referenceObject(address: HostAddress, increment: boolean): boolean {
		this.checkThread();
		return this.registry.reference(address, increment);
	}

	markAsPersistentObject(address: HostAddress): boolean {
		this.checkThread();
		return this.registry.markPersistent(address);
	}

	freeObject(address: HostAddress, finalize: boolean): void {
		this.checkThread();
		this.registry.free(address, finalize);
	}

	getObjectId(address: HostAddress): ObjectId {
		return this.registry.getObjectId(address);
	}

	getObject(objectId: ObjectId): object | undefined {
		return this.registry.getObject(objectId);
	}

	getObjectRegistry(): ObjectRegistry {
		return this.registry;
	}

	getScriptClass(classId: ScriptClassId): ScriptClassInfo | undefined {
		return this.scriptClasses.get(classId);
	}

	/**
	 * Attach a script class to a host object. An object that is already bound only has its
	 * class linkage replaced, keeping its identity.
	 * @returns the object id, or 0 on failure
	 */
	crossbind(host: HostObject, classId: ScriptClassId): ObjectId {
		this.checkThread();
		const info = this.scriptClasses.get(classId);
		if (!info) {
			this.logger.error(`[Runtime] Script class ${classId} does not exist`);
			return 0;
		}
		if (this.exposeClass(host.className) !== info.nativeClassId) {
			this.logger.error(
				`[Runtime] Cannot cross-bind ${info.className} onto ${host.className}, it extends ${info.nativeClassName}`
			);
			return 0;
		}
		const existing = this.registry.getObjectId(host.address);
		if (existing !== 0) {
			return this.rebind(existing, classId) ? existing : 0;
		}

		const constructed = tryCatch<unknown>(() => Reflect.construct(info.scriptConstructor, [CROSS_BIND]));
		if (constructed.caught) {
			this.logger.error(
				`[Runtime] Failed to cross-bind ${info.className}: ${formatException(constructed.exception)}`
			);
			return 0;
		}
		const target: unknown = constructed.value;
		if (!isScriptObject(target)) {
			this.logger.error(`[Runtime] Constructor of ${info.className} did not return an object`);
			return 0;
		}
		if (this.engine.getInternalField(target) !== undefined) {
			this.logger.error(`[Runtime] Constructor of ${info.className} did not forward its construct reason`);
			return 0;
		}
		return this.bindHostObject(host, target, "external");
	}

	/**
	 * Point a bound object at another script class without constructing it again
	 */
	rebind(objectId: ObjectId, classId: ScriptClassId): boolean {
		this.checkThread();
		const info = this.scriptClasses.get(classId);
		const target = this.registry.getObject(objectId);
		if (!info || !target) {
			this.logger.error(`[Runtime] Cannot rebind object ${objectId} to script class ${classId}`);
			return false;
		}
		const nativeClassId = this.registry.getHandle(objectId)?.classId;
		if (nativeClassId !== info.nativeClassId) {
			this.logger.error(
				`[Runtime] Cannot rebind object ${objectId} to ${info.className}, it extends ${info.nativeClassName}`
			);
			return false;
		}
		const prototype: unknown = Reflect.get(info.scriptConstructor, "prototype");
		if (!isScriptObject(prototype)) {
			return false;
		}
		Object.setPrototypeOf(target, prototype);
		return true;
	}

	/**
	 * Default value of a declared property, read from the class's default object.
	 * Falls back to the type's zero value when the default object or the value is unusable.
	 * @returns undefined when the class or property does not exist
	 */
	getScriptDefaultPropertyValue(classId: ScriptClassId, name: string): HostValue | undefined {
		this.checkThread();
		const info = this.scriptClasses.get(classId);
		const property = info?.properties.get(name);
		if (!info || !property) {
			return undefined;
		}
		if (info.defaultObject.state === "none") {
			const constructed = tryCatch<unknown>(() => Reflect.construct(info.scriptConstructor, [DEFAULT_OBJECT]));
			if (constructed.caught || !isScriptObject(constructed.value)) {
				if (constructed.caught) {
					this.logger.error(
						`[Runtime] Failed to build default object of ${info.className}: ${formatException(constructed.exception)}`
					);
				}
				info.defaultObject = { state: "failed" };
			} else {
				info.defaultObject = { state: "ready", target: constructed.value };
			}
		}
		if (info.defaultObject.state !== "ready") {
			this.logger.warn(`[Runtime] No default object for ${info.className}, using zero value for ${name}`);
			return zeroValue(property.type);
		}
		const value = this.readProperty(info.defaultObject.target, property);
		if (!value) {
			this.logger.warn(`[Runtime] Cannot read default value of ${info.className}.${name}, using zero value`);
			return zeroValue(property.type);
		}
		return value;
	}

	getScriptPropertyValue(objectId: ObjectId, property: ScriptPropertyInfo): HostValue | undefined {
		this.checkThread();
		const target = this.registry.getObject(objectId);
		if (!target) {
			return undefined;
		}
		const value = this.readProperty(target, property);
		if (!value) {
			this.logger.warn(`[Runtime] Cannot read property ${property.name} of object ${objectId}`);
		}
		return value;
	}

	setScriptPropertyValue(objectId: ObjectId, property: ScriptPropertyInfo, value: HostValue): boolean {
		this.checkThread();
		const target = this.registry.getObject(objectId);
		if (!target) {
			return false;
		}
		const scriptValue = this.converter.toScript(value);
		if (!scriptValue.ok) {
			this.logger.warn(`[Runtime] Cannot convert value for ${property.name}: ${scriptValue.reason}`);
			return false;
		}
		const checked = this.converter.toHost(scriptValue.value, property.type);
		if (!checked.ok) {
			this.logger.warn(`[Runtime] Cannot assign ${value.type} to ${property.name}: ${checked.reason}`);
			return false;
		}
		const assigned = tryCatch<boolean>(() => Reflect.set(target, property.name, scriptValue.value));
		if (assigned.caught) {
			this.logger.error(`[Runtime] Failed to set ${property.name}: ${formatException(assigned.exception)}`);
			return false;
		}
		return assigned.value;
	}

	/**
	 * Retain the function stored under `name` on a bound object
	 * @returns the function id, or 0 when the property is missing or not callable
	 */
	retainFunction(objectId: ObjectId, name: string): FunctionId {
		this.checkThread();
		const target = this.registry.getObject(objectId);
		if (!target) {
			return 0;
		}
		const value = tryCatch<unknown>(() => Reflect.get(target, name));
		if (value.caught) {
			this.logger.error(`[Runtime] Failed to read ${name}: ${formatException(value.exception)}`);
			return 0;
		}
		return this.functionCache.retain(value.value);
	}

	/**
	 * @returns false when the id is not retained
	 */
	releaseFunction(functionId: FunctionId): boolean {
		const released = this.functionCache.release(functionId);
		if (!released) {
			this.logger.debug(
				`[Runtime] Function ${functionId} is not retained (not an error if the runtime is disposing)`
			);
		}
		return released;
	}

	getFunctionCache(): FunctionCache {
		return this.functionCache;
	}

	/**
	 * Call a retained function with a bound object (or nothing, for id 0) as `this`
	 */
	callFunction(objectId: ObjectId, functionId: FunctionId, args: readonly HostValue[]): CallResult {
		this.checkThread();
		const fn = this.functionCache.get(functionId);
		if (!fn) {
			this.logger.error(`[Runtime] Invalid function ${functionId}`);
			return { status: "InvalidMethodCall", value: nil };
		}
		let self: unknown = undefined;
		if (objectId !== 0) {
			self = this.registry.getObject(objectId);
			if (!self) {
				this.logger.error(`[Runtime] Invalid \`this\` (object ${objectId}) for calling function`);
				return { status: "InvalidMethodCall", value: nil };
			}
		}
		return this.callBridge.call(fn, self, args);
	}

	/**
	 * Load a module as the host's entry point
	 */
	load(name: string): LoadResult {
		try {
			const module = this.loadModule("", name);
			if (!this.moduleCache.getMain()) {
				this.moduleCache.setMain(module);
			}
			return { status: "Ok", module };
		} catch (error) {
			this.logger.error(`[Runtime] Something went wrong on loading ${name}:`, error);
			return { status: this.loadStatusOf(error), module: null };
		}
	}

	/**
	 * Resolve and load a module requested by `parentId` ("" for the host)
	 * @throws EmbedError BadPath | NoSuchModule | ModuleLoadFailed
	 */
	loadModule(parentId: string, requestedId: string): JavaScriptModule {
		this.checkThread();
		let moduleId = requestedId;
		if (isRelativeId(requestedId)) {
			const combined = combine(dirname(parentId), requestedId);
			if (combined === null) {
				throw new EmbedError(`Bad path ${requestedId} from ${parentId || "<root>"}`, "BadPath", {
					parentId,
					requestedId,
				});
			}
			moduleId = combined;
		}

		const cached = this.moduleCache.find(moduleId);
		if (cached) {
			return this.ensureLoaded(cached);
		}

		const loader = this.loaders.get(moduleId);
		if (loader) {
			const module = this.newModule(moduleId, null);
			if (!loader.load(this, module)) {
				throw new EmbedError(`Failed to load builtin module ${moduleId}`, "ModuleLoadFailed", { moduleId });
			}
			module.markLoaded(true);
			this.moduleCache.insert(module);
			this.attachToParent(module, parentId);
			return module;
		}

		for (const resolver of this.resolvers) {
			const source = resolver.resolve(moduleId);
			if (!source) {
				continue;
			}
			const existing = this.moduleCache.find(source.sourceFilepath);
			if (existing) {
				return this.ensureLoaded(existing);
			}
			const module = this.newModule(source.sourceFilepath, resolver);
			this.moduleCache.insert(module);
			this.attachToParent(module, parentId);
			module.loading = true;
			const loaded = resolver.load(this, module);
			module.loading = false;
			if (!loaded) {
				this.moduleCache.remove(module.id);
				this.detachFromParent(module, parentId);
				throw new EmbedError(`Failed to load module ${module.id}`, "ModuleLoadFailed", { moduleId: module.id });
			}
			module.markLoaded(true);
			this.parseScriptClass(module);
			return module;
		}

		throw new EmbedError(`Unknown module ${moduleId}`, "NoSuchModule", { moduleId, parentId });
	}

	findModule(moduleId: string): JavaScriptModule | undefined {
		return this.moduleCache.find(moduleId);
	}

	getMainModule(): JavaScriptModule | null {
		return this.moduleCache.getMain();
	}

	/**
	 * Flag a module for reload if its source changed.
	 * Modules owned by a script class are reloaded through `reloadScriptClass()` instead.
	 */
	markAsReloading(moduleId: string): ReloadStatus {
		this.checkThread();
		const module = this.moduleCache.find(moduleId);
		if (!module) {
			return "NoSuchModule";
		}
		if (module.scriptClassId !== 0) {
			return "NoChanges";
		}
		if (!module.loaded || module.reloadRequested) {
			module.reloadRequested = true;
			return "Requested";
		}
		const { resolver } = module;
		if (!resolver) {
			return "NoChanges";
		}
		const changed = tryCatch(() => resolver.hasChanged(module));
		if (changed.caught) {
			this.logger.warn(`[Runtime] Cannot check ${moduleId} for changes:`, changed.exception);
			return "NoChanges";
		}
		if (!changed.value) {
			return "NoChanges";
		}
		module.reloadRequested = true;
		return "Requested";
	}

	/**
	 * Check every module not owned by a script class for source changes, then reload the flagged ones
	 * @returns number of modules reloaded
	 */
	scanExternalChanges(): number {
		this.checkThread();
		const modules = this.moduleCache.values().filter((module) => module.scriptClassId === 0);
		for (const module of modules) {
			if (!module.reloadRequested) {
				this.markAsReloading(module.id);
			}
		}
		let reloaded = 0;
		for (const module of modules) {
			if (!module.reloadRequested) {
				continue;
			}
			try {
				this.reload(module);
				reloaded++;
			} catch (error) {
				this.logger.error(`[Runtime] Failed to reload module ${module.id}:`, error);
			}
		}
		return reloaded;
	}

	/**
	 * Reload one module in place now, whether or not its source changed
	 */
	reloadModule(moduleId: string): HostStatus {
		this.checkThread();
		const module = this.moduleCache.find(moduleId);
		if (!module) {
			return "NoSuchModule";
		}
		return this.reloadAndReport(module);
	}

	/**
	 * Reload the module that declares a script class; the class keeps its id
	 */
	reloadScriptClass(classId: ScriptClassId): HostStatus {
		this.checkThread();
		const info = this.scriptClasses.get(classId);
		if (!info) {
			return "ClassNotRegistered";
		}
		const module = this.moduleCache.find(info.moduleId);
		if (!module) {
			return "NoSuchModule";
		}
		return this.reloadAndReport(module);
	}

	/**
	 * @internal Called by resolvers to run a module body
	 */
	executeModule(module: JavaScriptModule, code: string): boolean {
		const filename = module.id;
		const wrapper = tryCatch(() =>
			this.engine.evaluate(`(function (exports, require, module, __filename, __dirname) {${code}\n})`, filename)
		);
		if (wrapper.caught) {
			this.logger.error(`[Runtime] Failed to compile module ${filename}: ${formatException(wrapper.exception)}`);
			return false;
		}
		const body = wrapper.value;
		if (!isScriptFunction(body)) {
			this.logger.error(`[Runtime] Module wrapper of ${filename} is not a function`);
			return false;
		}
		const run = tryCatch(() =>
			Reflect.apply(body, module.exportsObject, [
				module.exports,
				this.createRequire(module.id),
				module.moduleObject,
				filename,
				dirname(filename),
			])
		);
		if (run.caught) {
			this.logger.error(`[Runtime] Exception thrown while loading ${filename}: ${formatException(run.exception)}`);
			return false;
		}
		return true;
	}

	evalSource(source: string, filename = "<eval>"): EvalResult {
		this.checkThread();
		const result = tryCatch(() => this.engine.evaluate(source, filename));
		if (result.caught) {
			this.logger.error(`[Runtime] Failed to evaluate ${filename}: ${formatException(result.exception)}`);
			return { status: "CompilationFailed", value: nil };
		}
		const converted = this.converter.toHost(result.value);
		return { status: "Ok", value: converted.ok ? converted.value : nil };
	}

	/**
	 * Compile without running
	 */
	validateScript(source: string, filename: string): HostStatus {
		const result = tryCatch(() => this.engine.compile(source, filename));
		if (result.caught) {
			this.logger.warn(`[Runtime] ${formatException(result.exception)}`);
			return "CompilationFailed";
		}
		return "Ok";
	}

	/**
	 * Queue a serialized message for the object's onmessage/onerror handler.
	 * May be called from any code on this thread; dispatch happens in `update()`.
	 */
	postMessage(message: InboxMessage): void {
		this.inbox.post(message);
	}

	/**
	 * Release something once the engine is between calls: on the next `update()`, or on `dispose()`.
	 * `ScriptInstance.dispose()` queues its cached methods here; hosts may queue their own handles.
	 * Flushes early when the queue is full.
	 */
	deferRelease(item: Releasable): void {
		if (this.deletionQueue.write(item)) {
			return;
		}
		this.flushDeferred();
		this.deletionQueue.write(item);
	}

	update(): void {
		this.checkThread();
		if (this.lifecycle !== "alive") {
			return;
		}
		for (const message of this.inbox.swap()) {
			this.dispatchMessage(message);
		}
		this.engine.performMicrotaskCheckpoint();
		this.flushDeferred();
	}

	gc(): void {
		this.checkThread();
		this.engine.collectGarbage();
	}

	getStatistics(): RuntimeStatistics {
		return {
			objects: this.registry.size,
			persistentObjects: this.registry.persistentCount,
			nativeClasses: this.nativeClasses.size,
			scriptClasses: this.scriptClasses.size,
			modules: this.moduleCache.size,
			functions: this.functionCache.size,
			pendingDeletions: this.deletionQueue.dataLeft(),
			pendingMessages: this.inbox.pending,
			heap: this.engine.getHeapStatistics(),
		};
	}

	/**
	 * Drop functions, classes and modules, then leave the environment registry.
	 * Object bindings stay until `destroy()`.
	 */
	dispose(): void {
		this.checkThread();
		if (this.lifecycle !== "alive") {
			return;
		}
		this.lifecycle = "disposing";
		this.functionCache.clear();
		this.scriptClasses.clear();
		this.moduleCache.deinit();
		this.flushDeferred();
		this.inbox.clear();
		environments.remove(this);
		this.lifecycle = "disposed";
	}

	/**
	 * Finalize every remaining binding and dispose the engine
	 */
	destroy(): void {
		this.checkThread();
		if (this.lifecycle === "destroyed") {
			return;
		}
		this.dispose();
		this.registry.freeAll();
		this.nativeClasses.clear();
		this.engine.setEmbedderData(undefined);
		this.engine.dispose();
		this.lifecycle = "destroyed";
	}

	private checkThread(): void {
		this.checks.check(
			this.threadId() === this.owningThread,
			() => `Runtime ${this.token} used from thread ${this.threadId()}, owned by ${this.owningThread}`
		);
	}

	private runFinalizer(classId: NativeClassId, address: HostAddress, isPersistent: boolean): void {
		const info = this.nativeClasses.get(classId);
		if (!info) {
			return;
		}
		try {
			info.finalizer(this, address, isPersistent);
		} catch (error) {
			this.logger.error(`[Runtime] Finalizer of ${info.name} failed for ${address}:`, error);
		}
	}

	private createNativeConstructor(info: NativeClassInfo): ScriptFunction {
		const engine = this.engine;
		const ctor = engine.newFunction(info.name, (self, args, newTarget) => {
			if (newTarget === undefined) {
				throw engine.newError(`Class constructor ${info.name} cannot be invoked without 'new'`);
			}
			if (info.kind === "value" || decodeConstructReason(args[0]) !== "construct") {
				return undefined;
			}
			if (!info.factory) {
				throw engine.newError(`${info.name} cannot be instantiated from script`);
			}
			if (!isScriptObject(self)) {
				throw engine.newError(`${info.name} constructor called without an instance`);
			}
			if (this.bindHostObject(info.factory(), self, "managed") === 0) {
				throw engine.newError(`Failed to bind a new ${info.name}`);
			}
			return undefined;
		});
		const prototype: unknown = Reflect.get(ctor, "prototype");
		if (isScriptObject(prototype)) {
			for (const [name, method] of Object.entries(info.methods)) {
				Object.defineProperty(prototype, name, {
					value: this.createNativeMethod(info, name, method),
					writable: true,
					configurable: true,
				});
			}
		}
		return ctor;
	}

	private createNativeMethod(info: NativeClassInfo, name: string, method: NativeMethod): ScriptFunction {
		const engine = this.engine;
		const label = `${info.name}.${name}`;
		return engine.newFunction(name, (self, args) => {
			const host = isScriptObject(self) ? this.unwrapScriptObject(self) : undefined;
			if (!host) {
				throw engine.newError(`${label} called on an object that is not a bound ${info.name}`);
			}
			const hostArgs: HostValue[] = [];
			for (let i = 0; i < args.length; i++) {
				const converted = this.converter.toHost(args[i]);
				if (!converted.ok) {
					throw engine.newError(`${label}: argument ${i}: ${converted.reason}`);
				}
				hostArgs.push(converted.value);
			}
			let result: HostValue;
			try {
				result = method(host, hostArgs);
			} catch (error) {
				throw engine.newError(`${label}: ${error instanceof Error ? error.message : String(error)}`);
			}
			const converted = this.converter.toScript(result);
			if (!converted.ok) {
				throw engine.newError(`${label}: cannot return ${result.type}: ${converted.reason}`);
			}
			return converted.value;
		});
	}

	private newWrapper(classId: NativeClassId): object | undefined {
		const ctor = this.nativeClasses.get(classId)?.scriptConstructor;
		if (!ctor) {
			return undefined;
		}
		const prototype: unknown = Reflect.get(ctor, "prototype");
		return isScriptObject(prototype) ? Object.create(prototype) : undefined;
	}

	private wrapHostObject(host: HostObject): object | undefined {
		const existing = this.registry.tryGetObject(host.address);
		if (existing) {
			return existing;
		}
		const objectId = this.bindHostObject(host);
		return objectId === 0 ? undefined : this.registry.getObject(objectId);
	}

	private unwrapScriptObject(target: object): HostObject | undefined {
		const address = this.engine.getInternalField(target);
		if (address === undefined || this.registry.getObjectId(address) === 0) {
			return undefined;
		}
		return this.hostObjects.resolve(address);
	}

	private readProperty(target: object, property: ScriptPropertyInfo): HostValue | undefined {
		const read = tryCatch<unknown>(() => Reflect.get(target, property.name));
		if (read.caught) {
			this.logger.error(`[Runtime] Failed to read ${property.name}: ${formatException(read.exception)}`);
			return undefined;
		}
		const converted = this.converter.toHost(read.value, property.type);
		return converted.ok ? converted.value : undefined;
	}

	private createRequire(parentId: string): ScriptFunction {
		const engine = this.engine;
		const require = engine.newFunction("require", (_self, args) => {
			const [moduleId] = args;
			if (typeof moduleId !== "string") {
				throw engine.newError("require: module id must be a string");
			}
			let module: JavaScriptModule;
			try {
				module = this.loadModule(parentId, moduleId);
			} catch (error) {
				if (error instanceof InvariantViolation) {
					throw error;
				}
				throw engine.newError(error instanceof Error ? error.message : String(error));
			}
			return module.exports;
		});
		Reflect.set(require, "moduleId", parentId);
		Reflect.set(require, "cache", this.moduleCache.cacheObject);
		Object.defineProperty(require, "main", {
			enumerable: true,
			get: () => this.moduleCache.getMain()?.moduleObject,
		});
		return require;
	}

	private newModule(moduleId: string, resolver: ModuleResolver | null): JavaScriptModule {
		const moduleObject = this.engine.newObject();
		const exportsObject = this.engine.newObject();
		const children = this.engine.newArray([]);
		Reflect.set(moduleObject, "id", moduleId);
		Reflect.set(moduleObject, "filename", moduleId);
		Reflect.set(moduleObject, "loaded", false);
		Reflect.set(moduleObject, "exports", exportsObject);
		Reflect.set(moduleObject, "children", children);
		return new JavaScriptModule(moduleId, moduleObject, exportsObject, children, resolver);
	}

	private ensureLoaded(module: JavaScriptModule): JavaScriptModule {
		if (module.loading || (module.loaded && !module.reloadRequested)) {
			return module;
		}
		this.reload(module);
		return module;
	}

	/**
	 * Run the module's source again in place: same module object, same exports object,
	 * same children array
	 */
	private reload(module: JavaScriptModule): void {
		const { resolver } = module;
		if (!resolver) {
			module.reloadRequested = false;
			throw new EmbedError(`Module loader does not support reloading: ${module.id}`, "ModuleLoadFailed", {
				moduleId: module.id,
			});
		}
		module.resetExports();
		module.markLoaded(false);
		module.loading = true;
		const loaded = resolver.load(this, module);
		module.loading = false;
		module.reloadRequested = false;
		if (!loaded) {
			throw new EmbedError(`Failed to reload module ${module.id}`, "ModuleLoadFailed", { moduleId: module.id });
		}
		module.markLoaded(true);
		this.parseScriptClass(module);
	}

	private reloadAndReport(module: JavaScriptModule): HostStatus {
		try {
			this.reload(module);
			return "Ok";
		} catch (error) {
			this.logger.error(`[Runtime] Failed to reload ${module.id}:`, error);
			return this.statusOf(error, "ModuleLoadFailed");
		}
	}

	private parseScriptClass(module: JavaScriptModule): void {
		const parsed = tryCatch(() => this.scriptClasses.parse(module.id, module.exports, module.scriptClassId));
		if (parsed.caught) {
			this.logger.error(
				`[Runtime] Something wrong when parsing script class in ${module.id}: ${formatException(parsed.exception)}`
			);
			return;
		}
		if (parsed.value === 0 && module.scriptClassId !== 0) {
			this.scriptClasses.remove(module.scriptClassId);
		}
		module.scriptClassId = parsed.value;
	}

	private attachToParent(module: JavaScriptModule, parentId: string): void {
		if (parentId === "") {
			return;
		}
		const parent = this.moduleCache.find(parentId);
		if (!parent) {
			this.logger.warn(`[Runtime] Parent module ${parentId} of ${module.id} not found`);
			return;
		}
		parent.children.push(module.moduleObject);
	}

	private detachFromParent(module: JavaScriptModule, parentId: string): void {
		const parent = parentId === "" ? undefined : this.moduleCache.find(parentId);
		const index = parent ? parent.children.indexOf(module.moduleObject) : -1;
		if (parent && index >= 0) {
			parent.children.splice(index, 1);
		}
	}

	private dispatchMessage(message: InboxMessage): void {
		const target = this.registry.getObject(message.objectId);
		if (!target) {
			this.logger.error(`[Runtime] Invalid worker ${message.objectId}`);
			return;
		}
		const handlerName = message.type === "message" ? "onmessage" : "onerror";
		const handler: unknown = Reflect.get(target, handlerName);
		if (!isScriptFunction(handler)) {
			this.logger.error(`[Runtime] ${handlerName} is not a function`);
			return;
		}
		const data = tryCatch(() => this.engine.deserialize(message.buffer));
		if (data.caught) {
			this.logger.error(`[Runtime] Failed to parse message value: ${formatException(data.exception)}`);
			return;
		}
		const event = this.engine.newObject();
		Reflect.set(event, "data", data.value);
		const called = tryCatch<unknown>(() => Reflect.apply(handler, target, [event]));
		if (called.caught) {
			this.logger.error(`[Runtime] Exception thrown in ${handlerName}: ${formatException(called.exception)}`);
		}
	}

	private flushDeferred(): void {
		for (let item = this.deletionQueue.read(); item !== undefined; item = this.deletionQueue.read()) {
			try {
				item.release();
			} catch (error) {
				this.logger.error("[Runtime] Deferred release failed:", error);
			}
		}
	}

	private loadStatusOf(error: unknown): HostStatus {
		if (isEmbedError(error) && error.code === "NoSuchModule") {
			return "FileNotFound";
		}
		if (isEmbedError(error) && error.code === "BadPath") {
			return "BadPath";
		}
		return this.statusOf(error, "CompilationFailed");
	}

	private statusOf(error: unknown, fallback: ErrorCode): HostStatus {
		if (error instanceof InvariantViolation) {
			throw error;
		}
		return fallback;
	}
}
