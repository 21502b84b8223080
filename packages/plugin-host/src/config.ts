/**
 * Host configuration loaded from environment variables
 */

import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { LIBS_PATH_VARIABLE, PLUGINS_PATH_VARIABLE } from "@scriptplug/plugin-runner-core";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_LEVEL_VARIABLE = "SCRIPTPLUG_LOG_LEVEL";

export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "ConfigError";
	}
}

export interface HostConfig {
	/** Folder whose subfolders are plugins */
	pluginsPath: string;
	/** Shared library folder, exposed to directives as $SCRIPTPLUG_LIBS */
	libsPath: string;
	logLevel: LogLevel;
}

type EnvSource = Readonly<Record<string, string | undefined>>;

export function loadConfig(source: EnvSource = process.env): HostConfig {
	const home = join(homedir(), ".scriptplug");
	return {
		pluginsPath: resolve(env(source, PLUGINS_PATH_VARIABLE) ?? join(home, "plugins")),
		libsPath: resolve(env(source, LIBS_PATH_VARIABLE) ?? join(home, "libs")),
		logLevel: enumEnv(source, LOG_LEVEL_VARIABLE, LOG_LEVELS, "info"),
	};
}

function env(source: EnvSource, key: string): string | undefined {
	const value = source[key]?.trim();
	return value ? value : undefined;
}

function enumEnv<T extends string>(source: EnvSource, key: string, allowed: readonly T[], defaultValue: T): T {
	const value = env(source, key)?.toLowerCase();
	if (value === undefined) return defaultValue;
	const match = allowed.find((candidate) => candidate === value);
	if (match === undefined) {
		throw new ConfigError(`Environment variable ${key} must be one of ${allowed.join(", ")}`);
	}
	return match;
}
