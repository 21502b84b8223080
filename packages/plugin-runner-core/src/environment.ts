import type { Environment } from "./types";

/** Host-managed plugin storage directory */
export const PLUGINS_PATH_VARIABLE = "SCRIPTPLUG_PLUGINS_PATH";
/** Host-managed shared library directory */
export const LIBS_PATH_VARIABLE = "SCRIPTPLUG_LIBS";
/** URL of the entry script currently being loaded */
export const THIS_SCRIPT_VARIABLE = "THIS_SCRIPT";

/**
 * Locations the host injects into every environment snapshot
 */
export interface HostPaths {
	pluginsPath: string;
	libsPath: string;
}

/**
 * Build a read-only environment snapshot from the process environment plus host paths.
 * Unset process variables are dropped.
 */
export function createEnvironment(
	processEnv: Readonly<Record<string, string | undefined>>,
	hostPaths: HostPaths
): Environment {
	const result: Record<string, string> = {};
	for (const [key, value] of Object.entries(processEnv)) {
		if (value !== undefined) {
			result[key] = value;
		}
	}
	result[PLUGINS_PATH_VARIABLE] = hostPaths.pluginsPath;
	result[LIBS_PATH_VARIABLE] = hostPaths.libsPath;
	return Object.freeze(result);
}

/**
 * Copy of the snapshot with THIS_SCRIPT pointing at the given script URL
 */
export function withThisScript(environment: Environment, scriptUrl: string): Environment {
	return Object.freeze({ ...environment, [THIS_SCRIPT_VARIABLE]: scriptUrl });
}
