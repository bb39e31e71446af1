export type TryCatchResult<T> = { caught: false; value: T } | { caught: true; exception: unknown };

/**
 * Run script-facing code and capture anything it throws
 */
export function tryCatch<T>(fn: () => T): TryCatchResult<T> {
	try {
		return { caught: false, value: fn() };
	} catch (exception) {
		return { caught: true, exception };
	}
}

const STACK_LOCATION = /\(?((?:[a-zA-Z]:)?[^\s():]+):(\d+):\d+\)?\s*$/;

interface ExceptionLocation {
	filename: string;
	line: number;
}

function readString(target: object, key: string): string | undefined {
	const value: unknown = Reflect.get(target, key);
	return typeof value === "string" ? value : undefined;
}

function findLocation(stack: string): ExceptionLocation | null {
	for (const frame of stack.split("\n")) {
		if (!frame.trimStart().startsWith("at ")) {
			continue;
		}
		const match = STACK_LOCATION.exec(frame);
		if (match) {
			return { filename: match[1], line: Number(match[2]) };
		}
	}
	return null;
}

function describe(value: unknown): string {
	try {
		return String(value);
	} catch {
		return Object.prototype.toString.call(value);
	}
}

/**
 * Format a captured script exception as `[file:line] message` followed by the stack.
 * Values that are not errors are formatted as `[native] value`.
 */
export function formatException(exception: unknown): string {
	if (typeof exception !== "object" || exception === null) {
		return `[native] ${describe(exception)}`;
	}
	const message = readString(exception, "message");
	if (message === undefined) {
		return `[native] ${describe(exception)}`;
	}
	const name = readString(exception, "name") ?? "Error";
	const stack = readString(exception, "stack");
	const location = stack ? findLocation(stack) : null;
	const head = location
		? `[${location.filename}:${location.line}] ${name}: ${message}`
		: `[native] ${name}: ${message}`;
	if (!stack) {
		return head;
	}
	const frames = stack
		.split("\n")
		.filter((line) => line.trimStart().startsWith("at "))
		.join("\n");
	return frames ? `${head}\n${frames}` : head;
}
