import type { ScriptEngine, ScriptFunction } from "./engine";
import { formatException, tryCatch } from "./exception-scope";
import { nil, type HostValue } from "./host-value";
import type { Logger } from "./types";
import type { ValueConverter } from "./value-convert";

export type CallStatus = "Ok" | "InvalidArgument" | "InvalidMethodCall";

export interface CallResult {
	status: CallStatus;
	/** Converted return value; nil unless status is Ok */
	value: HostValue;
}

/**
 * Invokes script functions on behalf of the host.
 * Script exceptions never leave this class: they are logged and reported as InvalidMethodCall.
 */
export class CallBridge {
	constructor(
		private engine: ScriptEngine,
		private converter: ValueConverter,
		private logger: Logger
	) {}

	call(fn: ScriptFunction, self: unknown, args: readonly HostValue[]): CallResult {
		const scope = this.engine.openHandleScope();
		try {
			const argv: unknown[] = [];
			for (let i = 0; i < args.length; i++) {
				const converted = this.converter.toScript(args[i]);
				if (!converted.ok) {
					this.logger.error(`[CallBridge] Failed to convert argument ${i}: ${converted.reason}`);
					return { status: "InvalidArgument", value: nil };
				}
				argv.push(converted.value);
			}

			const result = tryCatch<unknown>(() => Reflect.apply(fn, self, argv));
			if (result.caught) {
				this.logger.error(`[CallBridge] Exception thrown in function: ${formatException(result.exception)}`);
				return { status: "InvalidMethodCall", value: nil };
			}

			const returned = this.converter.toHost(result.value);
			if (returned.ok) {
				return { status: "Ok", value: returned.value };
			}
			if (this.engine.isPromise(result.value)) {
				this.reportRejection(result.value);
				return { status: "Ok", value: nil };
			}
			this.logger.error(`[CallBridge] Failed to convert return value: ${returned.reason}`);
			return { status: "InvalidMethodCall", value: nil };
		} finally {
			scope.close();
		}
	}

	/**
	 * The host does not consume asynchronous results; a rejection is only logged.
	 */
	private reportRejection(promise: unknown): void {
		if (typeof promise !== "object" || promise === null) {
			return;
		}
		const then: unknown = Reflect.get(promise, "then");
		if (typeof then !== "function") {
			return;
		}
		Reflect.apply(then, promise, [
			undefined,
			(reason: unknown) => {
				this.logger.error(`[CallBridge] Asynchronous result rejected: ${formatException(reason)}`);
			},
		]);
	}
}
