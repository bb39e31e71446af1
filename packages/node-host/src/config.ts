/**
 * Runtime configuration loaded from environment variables
 */

import { isLogLevel, type LogLevel } from "./console-logger";
import { DEFAULT_RELOAD_DEBOUNCE_MS } from "./source-watcher";

type Environment = Record<string, string | undefined>;

export interface RuntimeConfig {
	/** Module search paths in order; "" is the source root */
	searchPaths: string[];
	/** Thread and registry assertions */
	debugChecks: boolean;
	/** Capacity of the deferred-release queue */
	deletionQueueSize: number;
	/** Quiet period before changed sources are reloaded */
	reloadDebounceMs: number;
	/** Start the source watcher when the runtime is created */
	watch: boolean;
	logLevel: LogLevel;
}

export const DEFAULT_SEARCH_PATHS = ["", "node_modules"];

export function loadRuntimeConfig(environment: Environment = process.env): RuntimeConfig {
	const logLevel = env(environment, "HOSTSCRIPT_LOG_LEVEL") ?? "info";
	if (!isLogLevel(logLevel)) {
		throw new Error(`Environment variable HOSTSCRIPT_LOG_LEVEL must be one of debug, info, warn, error`);
	}

	return {
		searchPaths: listEnv(environment, "HOSTSCRIPT_SEARCH_PATHS") ?? [...DEFAULT_SEARCH_PATHS],
		debugChecks: boolEnv(environment, "HOSTSCRIPT_DEBUG_CHECKS", true),
		deletionQueueSize: intEnv(environment, "HOSTSCRIPT_DELETION_QUEUE_SIZE", 64),
		reloadDebounceMs: intEnv(environment, "HOSTSCRIPT_RELOAD_DEBOUNCE_MS", DEFAULT_RELOAD_DEBOUNCE_MS),
		watch: boolEnv(environment, "HOSTSCRIPT_WATCH", false),
		logLevel,
	};
}

function env(environment: Environment, key: string): string | undefined {
	const value = environment[key];
	return value === "" ? undefined : value;
}

function intEnv(environment: Environment, key: string, defaultValue: number): number {
	const value = env(environment, key);
	if (value === undefined) return defaultValue;
	const parsed = parseInt(value, 10);
	if (isNaN(parsed) || parsed < 0) {
		throw new Error(`Environment variable ${key} must be a number`);
	}
	return parsed;
}

function boolEnv(environment: Environment, key: string, defaultValue: boolean): boolean {
	const value = env(environment, key);
	if (value === undefined) return defaultValue;
	switch (value.toLowerCase()) {
		case "1":
		case "true":
		case "yes":
			return true;
		case "0":
		case "false":
		case "no":
			return false;
		default:
			throw new Error(`Environment variable ${key} must be a boolean`);
	}
}

/**
 * Comma-separated list; "." stands for the source root
 */
function listEnv(environment: Environment, key: string): string[] | undefined {
	const value = env(environment, key);
	if (value === undefined) return undefined;
	return value
		.split(",")
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0)
		.map((entry) => (entry === "." ? "" : entry));
}
