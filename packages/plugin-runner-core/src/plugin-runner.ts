import { readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { pathToFileURL } from "node:url";
import { classpathDirectivePrefix, findClasspathAdditions, pathExists, splitLines, type PathProbe } from "./classpath-resolver";
import { findSingleFileIn } from "./entry-script";
import { withThisScript } from "./environment";
import type { ErrorReporter } from "./error-reporter";
import { errorMessage } from "./errors";
import { createLoadingContext, type LoadingContext, type LoadingContextOptions } from "./loading-context";
import { extractRequireSpecifiers, isInjectableName, type ModuleRecord } from "./module-function";
import { noopLogger, type Binding, type DispatchFn, type Environment, type Logger, type RequireFn, type ScriptLoaderType } from "./types";

/**
 * Runs plugins written in one scripting language.
 *
 * Variants must look for distinct entry filenames: the coordinator picks the
 * first runner whose `canRun` answers true.
 */
export interface PluginRunner {
	/** Name listed when no runner can handle a plugin */
	readonly name: string;

	/**
	 * @param pluginRoot - absolute path to the plugin folder
	 * @returns true if this runner's entry script is present exactly once under the folder
	 * @throws AmbiguousEntryScriptError when the entry script is present more than once
	 */
	canRun(pluginRoot: string): Promise<boolean>;

	/**
	 * Load the plugin and run it through `dispatch`. Never throws: every
	 * outcome is recorded in the runner's error reporter under `pluginId`.
	 * @param binding - values available to the script as variables
	 */
	run(pluginRoot: string, pluginId: string, binding: Binding, dispatch: DispatchFn): Promise<void>;
}

/**
 * What makes one language variant different from another
 */
export interface ScriptLanguage {
	name: string;
	/** Entry script filename searched for under the plugin root */
	entryFileName: string;
	/** Line comment marker that starts classpath directives */
	commentMarker: string;
	loader: ScriptLoaderType;
}

/**
 * Shared collaborators of every runner in a batch
 */
export interface PluginRunnerOptions {
	errorReporter: ErrorReporter;
	environment: Environment;
	logger?: Logger;
	/** Existence check for classpath directives */
	probe?: PathProbe;
	/** Passed to every loading context this runner builds */
	loadingContext?: Omit<LoadingContextOptions, "logger">;
	/** Called with each context once it is built, before anything is loaded */
	onContextCreated?: (pluginId: string, context: LoadingContext) => void;
}

export const TYPESCRIPT: ScriptLanguage = {
	name: "TypeScriptPluginRunner",
	entryFileName: "plugin.ts",
	commentMarker: "//",
	loader: "ts",
};

export const JAVASCRIPT: ScriptLanguage = {
	name: "JavaScriptPluginRunner",
	entryFileName: "plugin.js",
	commentMarker: "//",
	loader: "js",
};

/**
 * Plugin runner for one script language.
 *
 * Loading (reading, directive resolution, context construction, compilation
 * and require checks) happens in the caller's flow; only the script body is
 * handed to `dispatch`.
 */
export class ScriptPluginRunner implements PluginRunner {
	readonly name: string;
	private readonly language: ScriptLanguage;
	private readonly errorReporter: ErrorReporter;
	private readonly environment: Environment;
	private readonly logger: Logger;
	private readonly probe: PathProbe;
	private readonly contextOptions: Omit<LoadingContextOptions, "logger">;
	private readonly onContextCreated?: (pluginId: string, context: LoadingContext) => void;

	constructor(language: ScriptLanguage, options: PluginRunnerOptions) {
		this.name = language.name;
		this.language = language;
		this.errorReporter = options.errorReporter;
		this.environment = options.environment;
		this.logger = options.logger ?? noopLogger;
		this.probe = options.probe ?? pathExists;
		this.contextOptions = options.loadingContext ?? {};
		this.onContextCreated = options.onContextCreated;
	}

	get entryFileName(): string {
		return this.language.entryFileName;
	}

	async canRun(pluginRoot: string): Promise<boolean> {
		return (await findSingleFileIn(pluginRoot, this.language.entryFileName)) !== null;
	}

	async run(pluginRoot: string, pluginId: string, binding: Binding, dispatch: DispatchFn): Promise<void> {
		let mainScript: string | null;
		try {
			mainScript = await findSingleFileIn(pluginRoot, this.language.entryFileName);
		} catch (error) {
			this.errorReporter.addLoadingError(pluginId, errorMessage(error), error);
			return;
		}
		if (!mainScript) {
			this.errorReporter.addLoadingError(pluginId, `Startup script ${this.language.entryFileName} was not found under ${pluginRoot}`);
			return;
		}

		let source: string;
		try {
			source = await readFile(mainScript, "utf8");
		} catch (error) {
			this.errorReporter.addLoadingError(pluginId, `Error while reading script. ${errorMessage(error)}`, error);
			return;
		}

		const context = this.buildContext(pluginRoot, pluginId, mainScript, source);
		if (!context) {
			return;
		}
		try {
			await this.runInContext(context, mainScript, source, pluginId, binding, dispatch);
		} catch (error) {
			this.errorReporter.addLoadingError(pluginId, `Error while loading plugin. ${errorMessage(error)}`, error);
		} finally {
			context.dispose();
		}
	}

	private buildContext(pluginRoot: string, pluginId: string, mainScript: string, source: string): LoadingContext | null {
		const mainScriptUrl = pathToFileURL(mainScript).href;
		const environment = withThisScript(this.environment, mainScriptUrl);

		const pathsToAdd = findClasspathAdditions(
			splitLines(source),
			classpathDirectivePrefix(this.language.commentMarker),
			environment,
			(path) => this.errorReporter.addLoadingError(pluginId, `Couldn't find dependency '${path}'`),
			this.probe,
			this.logger
		);
		pathsToAdd.push(pluginRoot);

		try {
			const context = createLoadingContext(pathsToAdd, { ...this.contextOptions, logger: this.logger });
			this.onContextCreated?.(pluginId, context);
			return context;
		} catch (error) {
			this.errorReporter.addLoadingError(
				pluginId,
				`Error while looking for dependencies in '${mainScriptUrl}'. ${errorMessage(error)}`,
				error
			);
			return null;
		}
	}

	private async runInContext(
		context: LoadingContext,
		mainScript: string,
		source: string,
		pluginId: string,
		binding: Binding,
		dispatch: DispatchFn
	): Promise<void> {
		const variableNames = Object.keys(binding);
		const invalidNames = variableNames.filter((name) => !isInjectableName(name));
		if (invalidNames.length > 0) {
			this.errorReporter.addLoadingError(pluginId, `Binding names are not valid identifiers: ${invalidNames.join(", ")}`);
			return;
		}

		let script: ReturnType<LoadingContext["compileScript"]>;
		try {
			script = context.compileScript(mainScript, source, this.language.loader, variableNames);
		} catch (error) {
			this.errorReporter.addLoadingError(pluginId, `Error while compiling script. ${errorMessage(error)}`, error);
			return;
		}

		// advisory: the text scan also sees commented-out and guarded requires
		for (const specifier of extractRequireSpecifiers(script.code)) {
			if (context.resolve(specifier, mainScript) === null) {
				this.logger.debug(`Module '${specifier}' does not resolve from ${mainScript} yet`);
			}
		}
		this.logger.debug(`Loaded ${mainScript} for plugin ${pluginId}`);

		const scriptRequire: RequireFn = context.createRequire(mainScript);
		const task = async (): Promise<void> => {
			try {
				const module: ModuleRecord = { exports: {} };
				context.registerModule(mainScript, module);
				script.invoke({ module, require: scriptRequire, dirname: dirname(mainScript), variables: binding });
				const entryPoint = defaultExport(module.exports);
				if (typeof entryPoint === "function") {
					await entryPoint(binding);
				}
			} catch (error) {
				this.errorReporter.addRunningError(pluginId, error);
			}
		};

		try {
			await dispatch(task);
		} catch (error) {
			this.errorReporter.addRunningError(pluginId, error, `Error while dispatching plugin. ${errorMessage(error)}`);
		}
	}
}

/**
 * Runner for `plugin.ts` entry scripts
 */
export function createTypeScriptPluginRunner(options: PluginRunnerOptions): ScriptPluginRunner {
	return new ScriptPluginRunner(TYPESCRIPT, options);
}

/**
 * Runner for `plugin.js` entry scripts
 */
export function createJavaScriptPluginRunner(options: PluginRunnerOptions): ScriptPluginRunner {
	return new ScriptPluginRunner(JAVASCRIPT, options);
}

/**
 * Every built-in runner, in selection order
 */
export function createPluginRunners(options: PluginRunnerOptions): PluginRunner[] {
	return [createTypeScriptPluginRunner(options), createJavaScriptPluginRunner(options)];
}

function defaultExport(exports: unknown): unknown {
	if (exports && typeof exports === "object" && "default" in exports) {
		return exports.default;
	}
	return exports;
}
