import { SerialTaskQueue } from "./serial-task-queue";
import { noopLogger, type DispatchFn, type DispatchTask, type Logger } from "./types";

/**
 * Dispatch that runs the task right away in the caller's flow
 */
export const runInline: DispatchFn = async (task: DispatchTask) => {
	await task();
};

/**
 * Single designated execution queue for plugin bodies.
 *
 * Tasks from every dispatcher run here one after another, interleaved with
 * whatever else the host schedules through `schedule`. `dispatch` resolves
 * once the task has finished and rejects with its failure.
 */
export class DesignatedQueue {
	private readonly queue: SerialTaskQueue;
	private dispatchedCount = 0;

	constructor(name: string = "designated", logger: Logger = noopLogger) {
		this.queue = new SerialTaskQueue(name, logger);
	}

	/**
	 * Dispatch function bound to this queue
	 */
	readonly dispatch: DispatchFn = (task: DispatchTask) => {
		this.dispatchedCount++;
		return this.queue.enqueue(`dispatch #${this.dispatchedCount}`, task);
	};

	/**
	 * Schedule host work on the same queue
	 */
	schedule<T>(label: string, task: () => Promise<T> | T): Promise<T> {
		return this.queue.enqueue(label, task);
	}

	/**
	 * Number of plugin tasks dispatched so far
	 */
	count(): number {
		return this.dispatchedCount;
	}

	onIdle(): Promise<void> {
		return this.queue.onIdle();
	}
}
