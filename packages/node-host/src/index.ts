// ============================================================================
// Script engine
// ============================================================================
export { VmScriptEngine, vmScriptEngineProvider } from "./vm-script-engine";
export type { VmScriptEngineOptions } from "./vm-script-engine";

// ============================================================================
// Platform services
// ============================================================================
export { ConsoleLogger, isLogLevel } from "./console-logger";
export type { LogLevel } from "./console-logger";
export { NodePathUtils } from "./node-path-utils";
export { FileSourceHost } from "./file-source-host";
export type { ChangeListener, WatchableSource } from "./file-source-host";
export { ScriptCompiler } from "./script-compiler";

// ============================================================================
// Host objects
// ============================================================================
export { BasicHostObject, RefCountedObject, HostObjectDatabase } from "./host-objects";
export type { HostClassDefinition } from "./host-objects";

// ============================================================================
// Hot reload
// ============================================================================
export { SourceWatcher, DEFAULT_RELOAD_DEBOUNCE_MS } from "./source-watcher";
export type { InvalidationTarget, SourceWatcherOptions } from "./source-watcher";

// ============================================================================
// Configuration and wiring
// ============================================================================
export { loadRuntimeConfig, DEFAULT_SEARCH_PATHS } from "./config";
export type { RuntimeConfig } from "./config";
export { createNodeRuntime } from "./create-runtime";
export type { NodeRuntime, NodeRuntimeOptions } from "./create-runtime";
