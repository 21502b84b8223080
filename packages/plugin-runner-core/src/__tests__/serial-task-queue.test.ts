import { describe, it, expect, vi } from "vitest";
import { BatchCancelledError } from "../errors";
import { SerialTaskQueue } from "../serial-task-queue";
import { DesignatedQueue, runInline } from "../thread-dispatch";
import { delay } from "./test-helpers";

describe("SerialTaskQueue", () => {
	it("should run tasks one at a time in submission order", async () => {
		const queue = new SerialTaskQueue("test");
		const events: string[] = [];
		const task = (name: string, ms: number) => async () => {
			events.push(`start ${name}`);
			await delay(ms);
			events.push(`end ${name}`);
			return name;
		};

		const results = await Promise.all([
			queue.enqueue("slow", task("slow", 30)),
			queue.enqueue("fast", task("fast", 1)),
			queue.enqueue("sync", () => {
				events.push("sync");
				return "sync";
			}),
		]);

		expect(results).toEqual(["slow", "fast", "sync"]);
		expect(events).toEqual(["start slow", "end slow", "start fast", "end fast", "sync"]);
	});

	it("should keep running after a task fails", async () => {
		const queue = new SerialTaskQueue("test");

		const failed = queue.enqueue("fails", async () => {
			throw new Error("task failed");
		});
		const next = queue.enqueue("next", async () => "still running");

		await expect(failed).rejects.toThrow("task failed");
		await expect(next).resolves.toBe("still running");
	});

	it("should report the running task and the queue size", async () => {
		const queue = new SerialTaskQueue("test");
		let release: () => void = () => undefined;
		const blocker = new Promise<void>((resolve) => {
			release = resolve;
		});

		const first = queue.enqueue("first", () => blocker);
		const second = queue.enqueue("second", () => undefined);

		expect(queue.current).toBe("first");
		expect(queue.isRunning()).toBe(true);
		expect(queue.size).toBe(1);

		release();
		await Promise.all([first, second]);
		await queue.onIdle();

		expect(queue.isRunning()).toBe(false);
		expect(queue.size).toBe(0);
	});

	it("should cancel tasks that have not started", async () => {
		const queue = new SerialTaskQueue("test");
		let release: () => void = () => undefined;
		const blocker = new Promise<void>((resolve) => {
			release = resolve;
		});
		const cancelledTask = vi.fn();

		const running = queue.enqueue("running", () => blocker);
		const waiting = queue.enqueue("waiting", cancelledTask).catch((error: unknown) => error);

		expect(queue.cancelPending("shutting down")).toBe(1);
		release();

		await expect(running).resolves.toBeUndefined();
		const outcome = await waiting;
		expect(outcome).toBeInstanceOf(BatchCancelledError);
		expect(outcome).toHaveProperty("message", "Batch 'waiting' was cancelled: shutting down");
		expect(cancelledTask).not.toHaveBeenCalled();
	});

	it("should resolve onIdle right away when nothing is queued", async () => {
		const queue = new SerialTaskQueue("test");

		await expect(queue.onIdle()).resolves.toBeUndefined();
	});
});

describe("DesignatedQueue", () => {
	it("should resolve dispatch after the task completed", async () => {
		const designated = new DesignatedQueue();
		const events: string[] = [];

		await designated.dispatch(async () => {
			await delay(5);
			events.push("task");
		});
		events.push("after dispatch");

		expect(events).toEqual(["task", "after dispatch"]);
		expect(designated.count()).toBe(1);
	});

	it("should reject dispatch with the task failure", async () => {
		const designated = new DesignatedQueue();

		await expect(designated.dispatch(() => {
			throw new Error("body failed");
		})).rejects.toThrow("body failed");
	});

	it("should interleave dispatched tasks with host work in queue order", async () => {
		const designated = new DesignatedQueue();
		const events: string[] = [];

		const hostWork = designated.schedule("repaint", async () => {
			await delay(10);
			events.push("repaint");
		});
		const plugin = designated.dispatch(() => {
			events.push("plugin");
		});
		await Promise.all([hostWork, plugin]);

		expect(events).toEqual(["repaint", "plugin"]);
	});
});

describe("runInline", () => {
	it("should run the task and propagate its failure", async () => {
		const task = vi.fn();

		await runInline(task);
		await expect(runInline(() => Promise.reject(new Error("inline failure")))).rejects.toThrow("inline failure");

		expect(task).toHaveBeenCalledTimes(1);
	});
});
