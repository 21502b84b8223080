import { createRequire } from "node:module";
import {
	DesignatedQueue,
	ExecutionCoordinator,
	createEnvironment,
	noopLogger,
} from "@scriptplug/plugin-runner-core";
import type {
	BatchReport,
	Binding,
	DispatchFn,
	ErrorSink,
	Logger,
	PluginDescriptor,
	PluginRunner,
	PluginRunnerOptions,
	RequireFn,
} from "@scriptplug/plugin-runner-core";
import type { HostConfig } from "./config";
import { ConsoleErrorSink } from "./adapters/console-error-sink";
import { discoverPlugins, toPathMap } from "./plugin-discovery";

/**
 * Decides which plugins a run applies to, e.g. a tool-window selection
 * or the plugin owning the active editor file
 */
export interface PluginSelector {
	selectPluginIds(plugins: readonly PluginDescriptor[]): string[] | Promise<string[]>;
}

export interface PluginHostOptions {
	config: HostConfig;
	logger?: Logger;
	/** Defaults to printing through the logger */
	sink?: ErrorSink;
	/** Defaults to the host's own designated queue */
	dispatch?: DispatchFn;
	/** Exposed to plugins as `host` */
	hostContext?: unknown;
	extraBinding?: Binding;
	/** Process environment the snapshots are taken from */
	processEnv?: Readonly<Record<string, string | undefined>>;
	/** Loader plugins fall back to for modules outside their search paths; defaults to the host's own */
	parentRequire?: RequireFn;
	createRunners?: (options: PluginRunnerOptions) => PluginRunner[];
}

/**
 * Node host: discovers plugins in the plugins folder and runs them
 * through an execution coordinator.
 */
export class PluginHost {
	readonly designatedQueue: DesignatedQueue;
	private readonly config: HostConfig;
	private readonly logger: Logger;
	private readonly coordinator: ExecutionCoordinator;

	constructor(options: PluginHostOptions) {
		this.config = options.config;
		this.logger = options.logger ?? noopLogger;
		this.designatedQueue = new DesignatedQueue("designated", this.logger);

		const processEnv = options.processEnv ?? process.env;
		this.coordinator = new ExecutionCoordinator({
			pluginPaths: async () => toPathMap(await this.listPlugins()),
			environment: () => createEnvironment(processEnv, {
				pluginsPath: this.config.pluginsPath,
				libsPath: this.config.libsPath,
			}),
			dispatch: options.dispatch ?? this.designatedQueue.dispatch,
			sink: options.sink ?? new ConsoleErrorSink(this.logger),
			hostContext: options.hostContext,
			extraBinding: options.extraBinding,
			logger: this.logger,
			createRunners: options.createRunners,
			runnerOptions: { loadingContext: { parentRequire: options.parentRequire ?? createRequire(__filename) } },
		});
	}

	/**
	 * Plugins currently present in the plugins folder
	 */
	listPlugins(): Promise<PluginDescriptor[]> {
		return discoverPlugins(this.config.pluginsPath);
	}

	/**
	 * Run the given plugins as one batch
	 */
	runPlugins(pluginIds: Iterable<string>, isStartupInvocation: boolean): Promise<BatchReport> {
		return this.coordinator.runPlugins(pluginIds, isStartupInvocation);
	}

	/**
	 * Run whatever the selector picks; an empty selection runs nothing
	 */
	async runSelected(selector: PluginSelector, isStartupInvocation: boolean): Promise<BatchReport> {
		const pluginIds = await selector.selectPluginIds(await this.listPlugins());
		if (pluginIds.length === 0) {
			this.logger.debug("No plugins selected");
			return { attempted: [], failed: [] };
		}
		return this.runPlugins(pluginIds, isStartupInvocation);
	}

	/**
	 * Run every discovered plugin
	 */
	async runAll(isStartupInvocation: boolean): Promise<BatchReport> {
		const plugins = await this.listPlugins();
		return this.runPlugins(plugins.map((plugin) => plugin.id), isStartupInvocation);
	}

	/**
	 * Drop queued batches that have not started
	 */
	cancelPending(reason?: string): number {
		return this.coordinator.cancelPending(reason);
	}

	/**
	 * Resolves when no batch is queued or running
	 */
	onIdle(): Promise<void> {
		return this.coordinator.onIdle();
	}
}
