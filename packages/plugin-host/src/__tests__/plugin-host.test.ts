import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import type { HostConfig } from "../config";
import { findPluginForFile } from "../plugin-discovery";
import { PluginHost, type PluginHostOptions } from "../plugin-host";
import { MockLogger, RecordingSink, TempDir } from "./test-helpers";

describe("PluginHost", () => {
	let temp: TempDir;
	let config: HostConfig;
	let logger: MockLogger;
	let sink: RecordingSink;
	let hostContext: { calls: string[] };

	beforeEach(async () => {
		temp = await TempDir.create();
		config = { pluginsPath: temp.resolve("plugins"), libsPath: temp.resolve("libs"), logLevel: "info" };
		logger = new MockLogger();
		sink = new RecordingSink();
		hostContext = { calls: [] };
	});

	afterEach(async () => {
		vi.restoreAllMocks();
		await temp.remove();
	});

	const createHost = (overrides: Partial<PluginHostOptions> = {}) =>
		new PluginHost({ config, logger, sink, hostContext, processEnv: {}, ...overrides });

	it("should run every discovered plugin in id order", async () => {
		await temp.write({
			"plugins/beta/plugin.js": "host.calls.push('beta:' + isStartup);",
			"plugins/alpha/plugin.ts": "host.calls.push('alpha');",
		});
		const host = createHost();

		const report = await host.runAll(true);

		expect(report).toEqual({ attempted: ["alpha", "beta"], failed: [] });
		expect(hostContext.calls).toEqual(["alpha", "beta:true"]);
		expect(host.designatedQueue.count()).toBe(2);
		expect(sink.displayed).toEqual([]);
	});

	it("should expose the shared libs folder to classpath directives", async () => {
		await temp.write({
			"libs/text-tools.js": "module.exports = { shout: (text) => text.toUpperCase() };",
			"plugins/shouter/plugin.js": [
				"// add-to-classpath $SCRIPTPLUG_LIBS",
				"const { shout } = require('text-tools');",
				"host.calls.push(shout('hi'));",
			].join("\n"),
		});

		await createHost().runPlugins(["shouter"], false);

		expect(hostContext.calls).toEqual(["HI"]);
	});

	it("should substitute process variables and report missing dependencies", async () => {
		await temp.write({
			"plugins/needs-shared/plugin.js": "// add-to-classpath $SHARED_DIR/missing.js\nhost.calls.push('ran');",
		});

		const report = await createHost({ processEnv: { SHARED_DIR: temp.resolve("shared") } }).runPlugins(["needs-shared"], false);

		expect(report.failed).toEqual(["needs-shared"]);
		expect(hostContext.calls).toEqual(["ran"]);
		expect(sink.displayed).toEqual([
			{
				title: "Loading error: needs-shared",
				message: `Couldn't find dependency '${temp.resolve("shared", "missing.js")}'`,
				severity: "error",
			},
		]);
	});

	it("should pick up plugins added after the host was created", async () => {
		const host = createHost();
		await host.runPlugins(["late"], false);

		await temp.write({ "plugins/late/plugin.js": "host.calls.push('late');" });
		const report = await host.runPlugins(["late"], false);

		expect(report.failed).toEqual([]);
		expect(hostContext.calls).toEqual(["late"]);
		expect(sink.displayed.map((entry) => entry.message)).toEqual(["Plugin folder was not found for 'late'"]);
	});

	it("should run only the plugins a selector picks", async () => {
		await temp.write({
			"plugins/editor/plugin.ts": "host.calls.push('editor');",
			"plugins/other/plugin.ts": "host.calls.push('other');",
		});
		const activeFile = temp.resolve("plugins", "editor", "plugin.ts");

		const report = await createHost().runSelected({
			selectPluginIds: (plugins) => {
				const owner = findPluginForFile(plugins, activeFile);
				return owner ? [owner] : [];
			},
		}, false);

		expect(report.attempted).toEqual(["editor"]);
		expect(hostContext.calls).toEqual(["editor"]);
	});

	it("should do nothing for an empty selection", async () => {
		await temp.write({ "plugins/idle/plugin.ts": "host.calls.push('idle');" });

		const report = await createHost().runSelected({ selectPluginIds: async () => [] }, false);

		expect(report).toEqual({ attempted: [], failed: [] });
		expect(hostContext.calls).toEqual([]);
		expect(logger.messages("debug")).toContain("No plugins selected");
	});

	it("should print errors through the logger when no sink is given", async () => {
		await createHost({ sink: undefined }).runPlugins(["ghost"], false);

		expect(logger.messages("error")).toEqual(["Loading error: ghost\nPlugin folder was not found for 'ghost'"]);
		expect(logger.messages("info")).toEqual(["Ran 1 plugin(s), 1 with errors"]);
	});

	it("should let plugins load the host's own dependencies from any working directory", async () => {
		vi.spyOn(process, "cwd").mockReturnValue(temp.path);
		await temp.write({
			"plugins/compiles/plugin.js": "const { transform } = require('sucrase');\nhost.calls.push(typeof transform);",
		});

		const report = await createHost().runPlugins(["compiles"], false);

		expect(report.failed).toEqual([]);
		expect(sink.displayed).toEqual([]);
		expect(hostContext.calls).toEqual(["function"]);
	});

	it("should fall back to the given parent loader for modules outside the plugin", async () => {
		await temp.write({
			"plugins/embedded/plugin.js": "const api = require('host-api');\nhost.calls.push(api.version);",
		});
		const parentRequire = Object.assign(
			(id: string): unknown => (id === "host-api" ? { version: "2.1" } : undefined),
			{
				resolve: (id: string): string => {
					if (id !== "host-api") {
						throw new Error(`Cannot find module '${id}'`);
					}
					return id;
				},
			}
		);

		const report = await createHost({ parentRequire }).runPlugins(["embedded"], false);

		expect(report.failed).toEqual([]);
		expect(hostContext.calls).toEqual(["2.1"]);
	});
});
