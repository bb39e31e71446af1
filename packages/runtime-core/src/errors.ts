/**
 * Failure kinds reported by the embedding layer.
 */
export type ErrorCode =
	| "DuplicateBinding"
	| "UnknownPointer"
	| "BadPath"
	| "NoSuchModule"
	| "ModuleLoadFailed"
	| "ClassNotRegistered"
	| "InvalidArgument"
	| "InvalidMethodCall"
	| "CompilationFailed"
	| "FileNotFound";

/**
 * Status returned to host code by public runtime operations
 */
export type HostStatus = "Ok" | ErrorCode;

/**
 * Error thrown inside the core. Public runtime operations convert it to a HostStatus.
 */
export class EmbedError extends Error {
	constructor(
		message: string,
		public readonly code: ErrorCode,
		public readonly details?: unknown
	) {
		super(message);
		this.name = "EmbedError";
	}
}

/**
 * Programmer error detected by a debug check (wrong thread, broken registry invariant, ...)
 */
export class InvariantViolation extends Error {
	constructor(message: string) {
		super(message);
		this.name = "InvariantViolation";
	}
}

export function isEmbedError(error: unknown): error is EmbedError {
	return error instanceof EmbedError;
}
