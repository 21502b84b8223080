import { readdir } from "node:fs/promises";
import { join, resolve, sep } from "node:path";
import type { PluginDescriptor } from "@scriptplug/plugin-runner-core";

/**
 * Every direct subfolder of the plugins folder is a plugin named after the folder.
 * A missing plugins folder holds no plugins.
 */
export async function discoverPlugins(pluginsPath: string): Promise<PluginDescriptor[]> {
	const root = resolve(pluginsPath);
	let names: string[];
	try {
		const entries = await readdir(root, { withFileTypes: true });
		names = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			return [];
		}
		throw error;
	}

	return names
		.sort()
		.map((name) => ({ id: name, rootPath: join(root, name) }));
}

/**
 * Plugin id → plugin folder map
 */
export function toPathMap(plugins: readonly PluginDescriptor[]): Map<string, string> {
	return new Map(plugins.map((plugin) => [plugin.id, plugin.rootPath]));
}

/**
 * Id of the plugin whose folder contains a file, if any
 */
export function findPluginForFile(plugins: readonly PluginDescriptor[], filePath: string): string | null {
	const target = resolve(filePath);
	const owner = plugins.find((plugin) => target === plugin.rootPath || target.startsWith(`${plugin.rootPath}${sep}`));
	return owner ? owner.id : null;
}
