#!/usr/bin/env node
/**
 * scriptplug host entry point
 */

import { resolve as resolvePath } from "node:path";
import { ConfigError, loadConfig } from "./config";
import { ConsoleLogger } from "./adapters/console-logger";
import { PluginHost } from "./plugin-host";

const USAGE = "Usage: scriptplug [--startup] [plugin-id...]";

export interface CliArguments {
	isStartup: boolean;
	pluginIds: string[];
	help: boolean;
}

export function parseArguments(argv: readonly string[]): CliArguments {
	const result: CliArguments = { isStartup: false, pluginIds: [], help: false };
	for (const arg of argv) {
		if (arg === "--startup") {
			result.isStartup = true;
		} else if (arg === "--help" || arg === "-h") {
			result.help = true;
		} else if (arg.startsWith("-")) {
			throw new ConfigError(`Unknown option ${arg}. ${USAGE}`);
		} else {
			result.pluginIds.push(arg);
		}
	}
	return result;
}

async function runCli(argv: readonly string[] = process.argv.slice(2)): Promise<number> {
	let args: CliArguments;
	let host: PluginHost;
	try {
		args = parseArguments(argv);
		const config = loadConfig();
		const logger = new ConsoleLogger("[scriptplug]", config.logLevel);
		host = new PluginHost({ config, logger });
	} catch (error) {
		console.error("[scriptplug]", error instanceof Error ? error.message : error);
		return 2;
	}

	if (args.help) {
		console.log(USAGE);
		return 0;
	}

	try {
		const report = args.pluginIds.length > 0
			? await host.runPlugins(args.pluginIds, args.isStartup)
			: await host.runAll(args.isStartup);
		return report.failed.length > 0 ? 1 : 0;
	} catch (error) {
		console.error("[scriptplug] Failed to run plugins:", error);
		return 1;
	}
}

const isMain =
	typeof __filename === "string" && process.argv[1]
		? resolvePath(__filename) === resolvePath(process.argv[1])
		: false;

if (isMain) {
	void runCli().then((code) => {
		process.exitCode = code;
	});
}

export default runCli;
export { PluginHost } from "./plugin-host";
export type { PluginHostOptions, PluginSelector } from "./plugin-host";
export { ConfigError, LOG_LEVELS, loadConfig } from "./config";
export type { HostConfig, LogLevel } from "./config";
export { ConsoleLogger } from "./adapters/console-logger";
export { ConsoleErrorSink } from "./adapters/console-error-sink";
export { discoverPlugins, findPluginForFile, toPathMap } from "./plugin-discovery";
