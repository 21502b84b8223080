import { describe, it, expect, beforeEach } from "vitest";
import { ErrorReporter } from "../error-reporter";
import { RecordingSink } from "./test-helpers";

describe("ErrorReporter", () => {
	let reporter: ErrorReporter;
	let sink: RecordingSink;

	beforeEach(() => {
		reporter = new ErrorReporter();
		sink = new RecordingSink();
	});

	it("should not call the sink when nothing was reported", () => {
		expect(reporter.flush(sink)).toEqual([]);
		expect(sink.displayed).toEqual([]);
	});

	it("should group records by plugin id in order of first error", () => {
		reporter.addLoadingError("beta", "Couldn't find dependency '/opt/a.js'");
		reporter.addLoadingError("alpha", "Startup script was not found. Tried: TypeScriptPluginRunner.");
		reporter.addLoadingError("beta", "Couldn't find dependency '/opt/b.js'");

		const flushed = reporter.flush(sink);

		expect(flushed).toEqual(["beta", "alpha"]);
		expect(sink.displayed).toEqual([
			{
				title: "Loading error: beta",
				message: "Couldn't find dependency '/opt/a.js'\nCouldn't find dependency '/opt/b.js'",
				severity: "error",
			},
			{
				title: "Loading error: alpha",
				message: "Startup script was not found. Tried: TypeScriptPluginRunner.",
				severity: "error",
			},
		]);
	});

	it("should include the stack of running errors", () => {
		const error = new Error("script exploded");
		error.stack = "Error: script exploded\n    at plugin.ts:3:9";

		reporter.addRunningError("demo", error);
		reporter.flush(sink);

		expect(sink.displayed).toEqual([
			{ title: "Running error: demo", message: "Error: script exploded\n    at plugin.ts:3:9", severity: "error" },
		]);
	});

	it("should prefix the stack when the message differs from it", () => {
		const error = new Error("queue closed");
		error.stack = "Error: queue closed\n    at dispatch";

		reporter.addRunningError("demo", error, "Error while dispatching plugin. queue closed");
		reporter.flush(sink);

		expect(sink.displayed[0]?.message).toBe(
			"Error while dispatching plugin. queue closed\nError: queue closed\n    at dispatch"
		);
	});

	it("should describe mixed phases in the title", () => {
		reporter.addLoadingError("demo", "Couldn't find dependency '/opt/a.js'");
		reporter.addRunningError("demo", "plain failure");
		reporter.flush(sink);

		expect(sink.displayed).toEqual([
			{
				title: "Loading and running errors: demo",
				message: "Couldn't find dependency '/opt/a.js'\nplain failure",
				severity: "error",
			},
		]);
	});

	it("should never deliver a record twice", () => {
		reporter.addLoadingError("demo", "first");
		reporter.flush(sink);
		reporter.addLoadingError("demo", "second");
		reporter.flush(sink);
		reporter.flush(sink);

		expect(sink.displayed.map((entry) => entry.message)).toEqual(["first", "second"]);
	});

	it("should keep records of other plugins apart", () => {
		reporter.addError("a", "loading", "error of a");
		reporter.addError("b", "running", "error of b", new Error("error of b"));

		expect(reporter.getPending("a")).toEqual([{ pluginId: "a", phase: "loading", message: "error of a" }]);
		expect(reporter.getPending("b")).toHaveLength(1);
		expect(reporter.pendingCount()).toBe(2);
	});

	it("should clear records before calling the sink", () => {
		reporter.addLoadingError("demo", "lost in display");
		const failingSink = {
			display: () => {
				throw new Error("sink failed");
			},
		};

		expect(() => reporter.flush(failingSink)).toThrow("sink failed");
		expect(reporter.pendingCount()).toBe(0);
	});
});
