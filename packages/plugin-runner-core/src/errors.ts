/**
 * Thrown when an entry script name occurs more than once under a plugin root
 */
export class AmbiguousEntryScriptError extends Error {
	constructor(
		public readonly fileName: string,
		public readonly rootPath: string,
		public readonly matches: string[]
	) {
		super(`Found several ${fileName} files under ${rootPath}: ${matches.join(", ")}`);
		this.name = "AmbiguousEntryScriptError";
	}
}

/**
 * Thrown when a loading context cannot enumerate one of its search paths
 */
export class LoadingContextError extends Error {
	constructor(
		message: string,
		public readonly path: string,
		cause?: unknown
	) {
		super(message, { cause });
		this.name = "LoadingContextError";
	}
}

/**
 * Thrown when a script source cannot be transformed or turned into a function
 */
export class ScriptCompilationError extends Error {
	constructor(
		message: string,
		public readonly filePath: string,
		cause?: unknown
	) {
		super(message, { cause });
		this.name = "ScriptCompilationError";
	}
}

/**
 * Rejection reason for queued batches dropped before they started
 */
export class BatchCancelledError extends Error {
	constructor(public readonly label: string, reason?: string) {
		super(reason ? `Batch '${label}' was cancelled: ${reason}` : `Batch '${label}' was cancelled`);
		this.name = "BatchCancelledError";
	}
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
