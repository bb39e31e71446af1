import { InvariantViolation } from "../errors";

/**
 * Hard assertions for programmer errors. When disabled the checks are skipped
 * entirely and a violated invariant is undefined behavior.
 */
export class DebugChecks {
	constructor(public readonly enabled: boolean) {}

	check(condition: boolean, message: string | (() => string)): void {
		if (!this.enabled || condition) {
			return;
		}
		throw new InvariantViolation(typeof message === "string" ? message : message());
	}
}
