import type { Logger } from "@hostscript/runtime-core";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
	return typeof value === "string" && Object.keys(LEVEL_ORDER).includes(value);
}

/**
 * Console implementation of Logger interface.
 * Uses console with a prefix for easy filtering.
 */
export class ConsoleLogger implements Logger {
	private prefix: string;
	private minLevel: LogLevel;

	constructor(prefix: string = "[hostscript]", minLevel: LogLevel = "info") {
		this.prefix = prefix;
		this.minLevel = minLevel;
	}

	debug(message: string, ...args: unknown[]): void {
		if (this.enabled("debug")) {
			console.debug(this.prefix, message, ...args);
		}
	}

	info(message: string, ...args: unknown[]): void {
		if (this.enabled("info")) {
			console.info(this.prefix, message, ...args);
		}
	}

	warn(message: string, ...args: unknown[]): void {
		if (this.enabled("warn")) {
			console.warn(this.prefix, message, ...args);
		}
	}

	error(message: string, ...args: unknown[]): void {
		console.error(this.prefix, message, ...args);
	}

	private enabled(level: LogLevel): boolean {
		return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
	}
}
