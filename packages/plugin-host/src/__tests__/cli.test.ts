import { describe, it, expect, afterEach, vi } from "vitest";
import runCli, { parseArguments } from "../index";
import { ConfigError } from "../config";

describe("parseArguments", () => {
	it("should collect plugin ids and the startup flag", () => {
		expect(parseArguments(["--startup", "alpha", "beta"])).toEqual({
			isStartup: true,
			pluginIds: ["alpha", "beta"],
			help: false,
		});
	});

	it("should recognise help", () => {
		expect(parseArguments(["-h"]).help).toBe(true);
		expect(parseArguments(["--help"]).help).toBe(true);
	});

	it("should reject unknown options", () => {
		expect(() => parseArguments(["--watch"])).toThrow(ConfigError);
		expect(() => parseArguments(["--watch"])).toThrow(
			"Unknown option --watch. Usage: scriptplug [--startup] [plugin-id...]"
		);
	});
});

describe("runCli", () => {
	afterEach(() => {
		vi.restoreAllMocks();
		vi.unstubAllEnvs();
	});

	it("should exit with 2 on bad arguments", async () => {
		const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

		await expect(runCli(["--watch"])).resolves.toBe(2);
		expect(error).toHaveBeenCalledWith(
			"[scriptplug]",
			"Unknown option --watch. Usage: scriptplug [--startup] [plugin-id...]"
		);
	});

	it("should print usage for help", async () => {
		vi.stubEnv("SCRIPTPLUG_LOG_LEVEL", "info");
		const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

		await expect(runCli(["--help"])).resolves.toBe(0);
		expect(log).toHaveBeenCalledWith("Usage: scriptplug [--startup] [plugin-id...]");
	});
});
