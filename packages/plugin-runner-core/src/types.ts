/**
 * Identifies a plugin's source tree. Immutable for the duration of a run.
 */
export interface PluginDescriptor {
	/** Plugin id, used to group errors and as the key in the host's id→path map */
	id: string;
	/** Absolute path to the plugin folder */
	rootPath: string;
}

/**
 * Host-supplied values exposed to a running plugin, keyed by variable name.
 */
export type Binding = Readonly<Record<string, unknown>>;

/**
 * Environment snapshot used to inline `$NAME` tokens in classpath directives.
 */
export type Environment = Readonly<Record<string, string>>;

/**
 * One classpath-extension directive after variable substitution
 */
export interface ClasspathEntry {
	/** The directive line as written in the script */
	rawDirective: string;
	/** Path after environment variables were inlined */
	resolvedPath: string;
	/** Whether the path exists as a file or directory */
	exists: boolean;
}

/**
 * Phase in which a plugin error happened
 */
export type ExecutionPhase = "loading" | "running";

/**
 * A single error record accumulated for a plugin
 */
export interface ExecutionError {
	pluginId: string;
	phase: ExecutionPhase;
	message: string;
	cause?: unknown;
}

/**
 * Severity passed to the error sink
 */
export type ErrorSeverity = "error" | "warning";

/**
 * Host-supplied display for grouped plugin errors
 */
export interface ErrorSink {
	display(title: string, message: string, severity?: ErrorSeverity): void;
}

/**
 * Work handed to the designated execution queue
 */
export type DispatchTask = () => void | Promise<void>;

/**
 * Host primitive that runs a task on the designated execution queue.
 * The returned promise settles once the task has completed (or failed).
 */
export type DispatchFn = (task: DispatchTask) => Promise<void>;

/**
 * Synchronous module loader, shaped like Node's `require`
 */
export interface RequireFn {
	(id: string): unknown;
	resolve(id: string): string;
}

/**
 * Abstract interface for logging.
 * Platform-specific implementations handle log output.
 */
export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

/**
 * Script source type
 */
export type ScriptLoaderType = "js" | "ts" | "tsx";

/**
 * Logger that drops every message
 */
export const noopLogger: Logger = {
	debug: () => undefined,
	info: () => undefined,
	warn: () => undefined,
	error: () => undefined,
};
