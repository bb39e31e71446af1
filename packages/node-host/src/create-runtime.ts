import { threadId } from "worker_threads";
import { Runtime, type Logger, type ScriptEngineProvider } from "@hostscript/runtime-core";
import { loadRuntimeConfig, type RuntimeConfig } from "./config";
import { ConsoleLogger } from "./console-logger";
import { FileSourceHost } from "./file-source-host";
import { HostObjectDatabase } from "./host-objects";
import { NodePathUtils } from "./node-path-utils";
import { ScriptCompiler } from "./script-compiler";
import { SourceWatcher } from "./source-watcher";
import { vmScriptEngineProvider } from "./vm-script-engine";

export interface NodeRuntimeOptions {
	/** Directory module ids are resolved against */
	root: string;
	/** Overrides applied on top of the environment configuration */
	config?: Partial<RuntimeConfig>;
	logger?: Logger;
	name?: string;
	engineProvider?: ScriptEngineProvider;
	/** Objects shared with other runtimes; a fresh database by default */
	database?: HostObjectDatabase;
}

export interface NodeRuntime {
	runtime: Runtime;
	sources: FileSourceHost;
	compiler: ScriptCompiler;
	watcher: SourceWatcher;
	database: HostObjectDatabase;
	config: RuntimeConfig;
	/** Stop watching and tear the runtime down */
	dispose(): void;
}

/**
 * Create and initialize a runtime that loads scripts from a directory
 */
export function createNodeRuntime(options: NodeRuntimeOptions): NodeRuntime {
	const config: RuntimeConfig = { ...loadRuntimeConfig(), ...options.config };
	const logger = options.logger ?? new ConsoleLogger("[hostscript]", config.logLevel);
	const database = options.database ?? new HostObjectDatabase();
	const sources = new FileSourceHost(options.root);
	const compiler = new ScriptCompiler();

	const runtime = Runtime.create({
		engineProvider: options.engineProvider ?? vmScriptEngineProvider,
		logger,
		hostObjects: database,
		sources: {
			host: sources,
			pathUtils: new NodePathUtils(),
			transformer: compiler,
			searchPaths: config.searchPaths,
		},
		deletionQueueSize: config.deletionQueueSize,
		debugChecks: config.debugChecks,
		threadId: () => threadId,
		name: options.name,
	});
	runtime.init();

	const watcher = new SourceWatcher(runtime, sources, logger, {
		debounceMs: config.reloadDebounceMs,
		invalidate: compiler,
	});
	if (config.watch) {
		watcher.start();
	}

	logger.debug(`[NodeRuntime] Runtime ${runtime.token} ready at ${sources.root}`);

	return {
		runtime,
		sources,
		compiler,
		watcher,
		database,
		config,
		dispose: () => {
			watcher.stop();
			runtime.destroy();
		},
	};
}
