// ============================================================================
// Core types
// ============================================================================
export type {
	HostAddress,
	ObjectId,
	FunctionId,
	NativeClassId,
	ScriptClassId,
	ScriptLoaderType,
	FileInfo,
	Disposable,
	SourceHost,
	PathUtils,
	Logger,
	Releasable,
} from "./types";

// ============================================================================
// Errors
// ============================================================================
export { EmbedError, InvariantViolation, isEmbedError } from "./errors";
export type { ErrorCode, HostStatus } from "./errors";

// ============================================================================
// Engine contract
// ============================================================================
export { isScriptFunction, isScriptObject } from "./engine";
export type {
	ScriptFunction,
	NativeCallback,
	PersistentHandle,
	HandleScope,
	HeapStatistics,
	ScriptEngine,
	ScriptEngineOptions,
	ScriptEngineProvider,
} from "./engine";
export { StrongRef, WeakIdentityMap } from "./handles";
export { tryCatch, formatException } from "./exception-scope";
export type { TryCatchResult } from "./exception-scope";

// ============================================================================
// Host object model
// ============================================================================
export { isRefCounted } from "./host-object";
export type {
	RuntimeToken,
	InstanceBindingCallbacks,
	HostObject,
	RefCountedHostObject,
	HostObjectResolver,
} from "./host-object";
export * as HostValues from "./host-value";
export { isHostValueType, zeroValue } from "./host-value";
export type { HostValue, HostValueType } from "./host-value";

// ============================================================================
// Bindings and calls
// ============================================================================
export { ObjectRegistry } from "./object-registry";
export type { BindingPolicy, HandleState, ObjectHandle, NativeClassLookup } from "./object-registry";
export { FunctionCache } from "./function-cache";
export { ValueConverter } from "./value-convert";
export type { ConvertResult, HostObjectBridge } from "./value-convert";
export { CallBridge } from "./call-bridge";
export type { CallResult, CallStatus } from "./call-bridge";
export { EnvironmentRegistry } from "./environment-registry";
export type { RegisteredEnvironment } from "./environment-registry";
export { Inbox } from "./inbox";
export type { InboxMessage, InboxMessageType } from "./inbox";

// ============================================================================
// Classes
// ============================================================================
export { CROSS_BIND, DEFAULT_OBJECT, decodeConstructReason } from "./classes/construct-reason";
export type { ConstructReason } from "./classes/construct-reason";
export { NativeClassTable } from "./classes/native-class";
export type {
	NativeClassKind,
	NativeFinalizer,
	NativeMethod,
	NativeClassDefinition,
	NativeClassInfo,
	ClassRegister,
} from "./classes/native-class";
export { ScriptClassTable } from "./classes/script-class";
export type { ScriptClassInfo, ScriptPropertyInfo, DefaultObjectState } from "./classes/script-class";

// ============================================================================
// Modules
// ============================================================================
export { JavaScriptModule } from "./modules/javascript-module";
export type { ModuleSourceInfo } from "./modules/javascript-module";
export { ModuleCache } from "./modules/module-cache";
export { DefaultModuleResolver } from "./modules/module-resolver";
export type {
	ModuleHost,
	ModuleResolver,
	ModuleLoader,
	SourceTransformer,
	ResolvedSource,
	DefaultModuleResolverOptions,
} from "./modules/module-resolver";
export { BRIDGE_MODULE_ID, NATIVE_MODULE_ID } from "./modules/builtin-modules";

// ============================================================================
// Runtime
// ============================================================================
export { Runtime, DEFAULT_DELETION_QUEUE_SIZE } from "./runtime";
export type {
	RuntimeParams,
	RuntimeSources,
	RuntimeState,
	ReloadStatus,
	LoadResult,
	EvalResult,
	RuntimeStatistics,
} from "./runtime";
export { ScriptInstance } from "./script-instance";
