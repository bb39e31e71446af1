import type { RuntimeToken } from "./host-object";

/**
 * What the registry needs from a runtime
 */
export interface RegisteredEnvironment {
	readonly token: RuntimeToken;
	isTearingDown(): boolean;
}

/**
 * Process-wide table of live runtimes, keyed by the opaque token that engine and host
 * callbacks carry.
 *
 * A runtime and its engine callbacks always share one JavaScript thread (module instances are
 * not shared between worker threads), so lookups cannot race with `remove()` and no lock is taken.
 */
export class EnvironmentRegistry<R extends RegisteredEnvironment> {
	private environments = new Map<RuntimeToken, R>();
	private nextToken = 1;

	/** Issue a token for a runtime under construction */
	allocateToken(): RuntimeToken {
		return this.nextToken++;
	}

	add(environment: R): void {
		if (this.environments.has(environment.token)) {
			throw new Error(`Environment ${environment.token} is already registered`);
		}
		this.environments.set(environment.token, environment);
	}

	remove(environment: R): boolean {
		if (this.environments.get(environment.token) !== environment) {
			return false;
		}
		return this.environments.delete(environment.token);
	}

	/**
	 * The runtime for a token, or undefined when it is gone or tearing down
	 */
	access(token: RuntimeToken | undefined): R | undefined {
		if (token === undefined) {
			return undefined;
		}
		const environment = this.environments.get(token);
		if (!environment || environment.isTearingDown()) {
			return undefined;
		}
		return environment;
	}

	/**
	 * The runtime for a token even while it is tearing down
	 */
	unsafeAccess(token: RuntimeToken | undefined): R | undefined {
		return token === undefined ? undefined : this.environments.get(token);
	}

	get size(): number {
		return this.environments.size;
	}
}
