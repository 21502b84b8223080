import { ErrorReporter } from "./error-reporter";
import { errorMessage } from "./errors";
import { createPluginRunners, type PluginRunner, type PluginRunnerOptions } from "./plugin-runner";
import { SerialTaskQueue } from "./serial-task-queue";
import { noopLogger, type Binding, type DispatchFn, type Environment, type ErrorSink, type Logger } from "./types";

export const HOST_BINDING = "host";
export const IS_STARTUP_BINDING = "isStartup";
export const PLUGIN_PATH_BINDING = "pluginPath";

/**
 * Outcome of one batch
 */
export interface BatchReport {
	/** Plugin ids in the order they were attempted */
	attempted: string[];
	/** Plugin ids that produced at least one error */
	failed: string[];
}

/**
 * Options for the execution coordinator
 */
export interface ExecutionCoordinatorOptions {
	/** Host's id→path mapping; copied when each batch starts */
	pluginPaths: () => ReadonlyMap<string, string> | Promise<ReadonlyMap<string, string>>;
	/** Environment snapshot for classpath directives */
	environment: () => Environment;
	/** Runs plugin bodies on the designated queue */
	dispatch: DispatchFn;
	sink: ErrorSink;
	/** Host handle exposed to plugins as `host` */
	hostContext?: unknown;
	/** Additional binding entries; the built-in entries take precedence */
	extraBinding?: Binding;
	logger?: Logger;
	/** Runner variants in selection order; defaults to TypeScript then JavaScript */
	createRunners?: (options: PluginRunnerOptions) => PluginRunner[];
	/** Extra options handed to every runner */
	runnerOptions?: Omit<PluginRunnerOptions, "errorReporter" | "environment" | "logger">;
	/** Background worker; a private one is created when omitted */
	queue?: SerialTaskQueue;
}

type RunnerSelection =
	| { kind: "found"; runner: PluginRunner }
	| { kind: "none" }
	| { kind: "failed" };

/**
 * Runs batches of plugins on a single background worker.
 *
 * Plugins in a batch run one after another; errors of each plugin are
 * flushed to the sink before the next one starts, and no failure of one
 * plugin, or of the sink reporting it, stops the rest of the batch.
 */
export class ExecutionCoordinator {
	private readonly options: ExecutionCoordinatorOptions;
	private readonly logger: Logger;
	private readonly queue: SerialTaskQueue;
	private batchCount = 0;

	constructor(options: ExecutionCoordinatorOptions) {
		this.options = options;
		this.logger = options.logger ?? noopLogger;
		this.queue = options.queue ?? new SerialTaskQueue("plugin worker", this.logger);
	}

	/**
	 * Queue a batch. Batches never overlap; they start in submission order.
	 * @param pluginIds - ids to run, in order; duplicates run once
	 */
	runPlugins(pluginIds: Iterable<string>, isStartupInvocation: boolean): Promise<BatchReport> {
		const ids = Array.from(new Set(pluginIds));
		this.batchCount++;
		const label = `batch #${this.batchCount} (${ids.join(", ")})`;
		return this.queue.enqueue(label, async () => {
			try {
				return await this.runBatch(ids, isStartupInvocation);
			} catch (error) {
				this.logger.error(`Failed to run ${label}:`, error);
				throw error;
			}
		});
	}

	/**
	 * Drop batches that have not started yet
	 * @returns number of dropped batches
	 */
	cancelPending(reason?: string): number {
		return this.queue.cancelPending(reason);
	}

	/**
	 * Resolves once every queued batch has finished
	 */
	onIdle(): Promise<void> {
		return this.queue.onIdle();
	}

	/**
	 * Values exposed to a plugin while it runs
	 */
	createBinding(pluginPath: string, isStartupInvocation: boolean): Binding {
		return {
			...this.options.extraBinding,
			[HOST_BINDING]: this.options.hostContext,
			[IS_STARTUP_BINDING]: isStartupInvocation,
			[PLUGIN_PATH_BINDING]: pluginPath,
		};
	}

	private async runBatch(pluginIds: string[], isStartupInvocation: boolean): Promise<BatchReport> {
		const errorReporter = new ErrorReporter();
		const pluginPaths = new Map(await this.options.pluginPaths());
		const runnerOptions: PluginRunnerOptions = {
			...this.options.runnerOptions,
			errorReporter,
			environment: this.options.environment(),
			logger: this.logger,
		};
		const runners = (this.options.createRunners ?? createPluginRunners)(runnerOptions);
		const report: BatchReport = { attempted: [], failed: [] };

		for (const pluginId of pluginIds) {
			report.attempted.push(pluginId);
			await this.runPlugin(pluginId, pluginPaths.get(pluginId), runners, errorReporter, isStartupInvocation);

			if (this.flushErrors(pluginId, errorReporter)) {
				report.failed.push(pluginId);
			}
		}

		this.logger.info(`Ran ${report.attempted.length} plugin(s), ${report.failed.length} with errors`);
		return report;
	}

	/**
	 * @returns true when the plugin had errors to report
	 */
	private flushErrors(pluginId: string, errorReporter: ErrorReporter): boolean {
		const pending = errorReporter.pendingCount();
		try {
			return errorReporter.flush(this.options.sink).includes(pluginId);
		} catch (error) {
			this.logger.error(`Failed to report errors of plugin ${pluginId}:`, error);
			return pending > 0;
		}
	}

	private async runPlugin(
		pluginId: string,
		pluginPath: string | undefined,
		runners: readonly PluginRunner[],
		errorReporter: ErrorReporter,
		isStartupInvocation: boolean
	): Promise<void> {
		if (pluginPath === undefined) {
			errorReporter.addLoadingError(pluginId, `Plugin folder was not found for '${pluginId}'`);
			return;
		}

		const selection = await this.findRunner(pluginId, pluginPath, runners, errorReporter);
		if (selection.kind === "failed") {
			return;
		}
		if (selection.kind === "none") {
			const tried = runners.map((runner) => runner.name).join(", ");
			errorReporter.addLoadingError(pluginId, `Startup script was not found. Tried: ${tried}.`);
			return;
		}

		this.logger.debug(`Running plugin ${pluginId} with ${selection.runner.name}`);
		const binding = this.createBinding(pluginPath, isStartupInvocation);
		await selection.runner.run(pluginPath, pluginId, binding, this.options.dispatch);
	}

	private async findRunner(
		pluginId: string,
		pluginPath: string,
		runners: readonly PluginRunner[],
		errorReporter: ErrorReporter
	): Promise<RunnerSelection> {
		for (const runner of runners) {
			try {
				if (await runner.canRun(pluginPath)) {
					return { kind: "found", runner };
				}
			} catch (error) {
				errorReporter.addLoadingError(pluginId, errorMessage(error), error);
				return { kind: "failed" };
			}
		}
		return { kind: "none" };
	}
}
