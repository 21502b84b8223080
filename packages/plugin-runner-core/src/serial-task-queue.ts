import { BatchCancelledError } from "./errors";
import { noopLogger, type Logger } from "./types";

interface QueuedTask {
	label: string;
	run: () => Promise<void>;
	cancel: (error: BatchCancelledError) => void;
}

/**
 * Runs async tasks one at a time in submission order.
 * Used as the dedicated background worker for plugin batches and as the
 * designated execution queue.
 */
export class SerialTaskQueue {
	private readonly name: string;
	private readonly logger: Logger;
	private pending: QueuedTask[] = [];
	private running: string | null = null;
	private idleWaiters: Array<() => void> = [];

	constructor(name: string, logger: Logger = noopLogger) {
		this.name = name;
		this.logger = logger;
	}

	/**
	 * Queue a task; the returned promise settles with the task's outcome
	 */
	enqueue<T>(label: string, task: () => Promise<T> | T): Promise<T> {
		return new Promise<T>((resolve, reject) => {
			this.pending.push({
				label,
				run: async () => {
					try {
						resolve(await task());
					} catch (error) {
						reject(error);
					}
				},
				cancel: reject,
			});
			this.drain();
		});
	}

	/**
	 * Number of tasks waiting to start
	 */
	get size(): number {
		return this.pending.length;
	}

	/**
	 * Label of the task currently running, or null when idle
	 */
	get current(): string | null {
		return this.running;
	}

	isRunning(): boolean {
		return this.running !== null;
	}

	/**
	 * Reject every task that has not started yet
	 * @returns number of cancelled tasks
	 */
	cancelPending(reason?: string): number {
		const cancelled = this.pending;
		this.pending = [];
		for (const task of cancelled) {
			this.logger.debug(`[${this.name}] Cancelled ${task.label}`);
			task.cancel(new BatchCancelledError(task.label, reason));
		}
		this.notifyIdle();
		return cancelled.length;
	}

	/**
	 * Resolves once nothing is running or waiting
	 */
	onIdle(): Promise<void> {
		if (this.running === null && this.pending.length === 0) {
			return Promise.resolve();
		}
		return new Promise((resolve) => this.idleWaiters.push(resolve));
	}

	private drain(): void {
		if (this.running !== null) {
			return;
		}
		const next = this.pending.shift();
		if (!next) {
			this.notifyIdle();
			return;
		}

		this.running = next.label;
		this.logger.debug(`[${this.name}] Started ${next.label}`);
		void next.run().finally(() => {
			this.logger.debug(`[${this.name}] Finished ${next.label}`);
			this.running = null;
			this.drain();
		});
	}

	private notifyIdle(): void {
		if (this.running !== null || this.pending.length > 0) {
			return;
		}
		const waiters = this.idleWaiters;
		this.idleWaiters = [];
		for (const waiter of waiters) {
			waiter();
		}
	}
}
