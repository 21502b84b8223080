// ============================================================================
// Core Classes
// ============================================================================

/**
 * Runs batches of plugins on the background worker
 */
export { ExecutionCoordinator, HOST_BINDING, IS_STARTUP_BINDING, PLUGIN_PATH_BINDING } from "./execution-coordinator";

/**
 * Language runners
 */
export {
	ScriptPluginRunner,
	TYPESCRIPT,
	JAVASCRIPT,
	createTypeScriptPluginRunner,
	createJavaScriptPluginRunner,
	createPluginRunners,
} from "./plugin-runner";

/**
 * Per-batch error accumulation
 */
export { ErrorReporter } from "./error-reporter";

/**
 * Isolated module resolution for one plugin run
 */
export { LoadingContext, createLoadingContext, defaultParentRequire, normalizeSearchPath } from "./loading-context";

/**
 * TypeScript/JavaScript compiler
 */
export { ScriptCompiler, getLoaderForPath } from "./script-compiler";

/**
 * Serial execution
 */
export { SerialTaskQueue } from "./serial-task-queue";
export { DesignatedQueue, runInline } from "./thread-dispatch";

// ============================================================================
// Functions
// ============================================================================

export {
	ADD_TO_CLASSPATH_KEYWORD,
	classpathDirectivePrefix,
	findClasspathAdditions,
	inlineEnvironmentVariables,
	pathExists,
	resolveClasspathEntries,
	splitLines,
	toFilePath,
} from "./classpath-resolver";
export {
	LIBS_PATH_VARIABLE,
	PLUGINS_PATH_VARIABLE,
	THIS_SCRIPT_VARIABLE,
	createEnvironment,
	withThisScript,
} from "./environment";
export { findSingleFileIn, listFilesRecursive } from "./entry-script";
export { createModuleFunction, extractRequireSpecifiers, isInjectableName } from "./module-function";

// ============================================================================
// Errors
// ============================================================================

export {
	AmbiguousEntryScriptError,
	BatchCancelledError,
	LoadingContextError,
	ScriptCompilationError,
	errorMessage,
} from "./errors";

// ============================================================================
// Types and Interfaces
// ============================================================================

export type { BatchReport, ExecutionCoordinatorOptions } from "./execution-coordinator";
export type { PluginRunner, PluginRunnerOptions, ScriptLanguage } from "./plugin-runner";
export type { LoadingContextOptions, SearchRoot } from "./loading-context";
export type { PathProbe } from "./classpath-resolver";
export type { HostPaths } from "./environment";
export type { ModuleFunction, ModuleRecord, ModuleScope } from "./module-function";
export { noopLogger } from "./types";
export type {
	Binding,
	ClasspathEntry,
	DispatchFn,
	DispatchTask,
	Environment,
	ErrorSeverity,
	ErrorSink,
	ExecutionError,
	ExecutionPhase,
	Logger,
	PluginDescriptor,
	RequireFn,
	ScriptLoaderType,
} from "./types";
