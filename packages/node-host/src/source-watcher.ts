import type { Disposable, Logger, Runtime } from "@hostscript/runtime-core";
import type { ChangeListener, WatchableSource } from "./file-source-host";

export const DEFAULT_RELOAD_DEBOUNCE_MS = 300;

/**
 * Anything that caches per-path output and must forget a changed file
 */
export interface InvalidationTarget {
	invalidate(path: string): void;
}

export interface SourceWatcherOptions {
	debounceMs?: number;
	/** Notified of every changed path before modules are reloaded */
	invalidate?: InvalidationTarget;
}

/**
 * Collects change notifications from a source and hot-reloads the affected modules
 * once the burst of changes has settled.
 */
export class SourceWatcher {
	private watchDisposable: Disposable | null = null;
	private reloadTimer: ReturnType<typeof setTimeout> | null = null;
	private pending = new Set<string>();
	private debounceMs: number;
	private invalidate?: InvalidationTarget;

	constructor(
		private runtime: Runtime,
		private source: WatchableSource,
		private logger: Logger,
		options: SourceWatcherOptions = {}
	) {
		this.debounceMs = options.debounceMs ?? DEFAULT_RELOAD_DEBOUNCE_MS;
		this.invalidate = options.invalidate;
	}

	get isWatching(): boolean {
		return this.watchDisposable !== null;
	}

	start(): void {
		if (this.watchDisposable) {
			return;
		}
		const onChange: ChangeListener = (path) => {
			this.pending.add(path);
			this.scheduleReload();
		};
		this.watchDisposable = this.source.watch(onChange);
		this.logger.debug("[SourceWatcher] Watching for source changes");
	}

	/**
	 * Stop watching. Changes collected but not yet applied are dropped.
	 */
	stop(): void {
		if (this.reloadTimer !== null) {
			clearTimeout(this.reloadTimer);
			this.reloadTimer = null;
		}
		this.pending.clear();
		if (this.watchDisposable) {
			this.watchDisposable.dispose();
			this.watchDisposable = null;
		}
	}

	/**
	 * Apply collected changes now
	 * @returns number of modules reloaded
	 */
	flush(): number {
		if (this.reloadTimer !== null) {
			clearTimeout(this.reloadTimer);
			this.reloadTimer = null;
		}
		const paths = [...this.pending];
		this.pending.clear();
		if (paths.length === 0 || this.runtime.state !== "alive") {
			return 0;
		}

		let reloaded = 0;
		for (const path of paths) {
			this.invalidate?.invalidate(path);
			const module = this.runtime.findModule(path);
			if (!module) {
				this.logger.debug(`[SourceWatcher] Ignoring change to unloaded file: ${path}`);
				continue;
			}
			if (module.scriptClassId !== 0) {
				const status = this.runtime.reloadScriptClass(module.scriptClassId);
				if (status === "Ok") {
					reloaded++;
				} else {
					this.logger.warn(`[SourceWatcher] Class reload of ${path} returned ${status}`);
				}
				continue;
			}
			this.runtime.markAsReloading(path);
		}
		reloaded += this.runtime.scanExternalChanges();
		if (reloaded > 0) {
			this.logger.info(`[SourceWatcher] Reloaded ${reloaded} module(s)`);
		}
		return reloaded;
	}

	private scheduleReload(): void {
		if (this.reloadTimer !== null) {
			clearTimeout(this.reloadTimer);
		}
		this.reloadTimer = setTimeout(() => {
			this.reloadTimer = null;
			try {
				this.flush();
			} catch (error) {
				this.logger.error("[SourceWatcher] Failed to reload scripts:", error);
			}
		}, this.debounceMs);
	}
}
