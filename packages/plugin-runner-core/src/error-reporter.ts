import { errorMessage } from "./errors";
import type { ErrorSink, ExecutionError, ExecutionPhase } from "./types";

/**
 * Accumulates plugin errors across the loading and running phases and
 * delivers them to an error sink grouped by plugin id.
 *
 * One reporter is created per batch; it is flushed after every plugin id.
 */
export class ErrorReporter {
	private records: ExecutionError[] = [];

	addError(pluginId: string, phase: ExecutionPhase, message: string, cause?: unknown): void {
		this.records.push(cause === undefined ? { pluginId, phase, message } : { pluginId, phase, message, cause });
	}

	addLoadingError(pluginId: string, message: string, cause?: unknown): void {
		this.addError(pluginId, "loading", message, cause);
	}

	/**
	 * Record a failure raised while the plugin was running
	 */
	addRunningError(pluginId: string, error: unknown, message?: string): void {
		this.addError(pluginId, "running", message ?? errorMessage(error), error);
	}

	/**
	 * Records not delivered yet, optionally for one plugin only
	 */
	getPending(pluginId?: string): ExecutionError[] {
		return this.records.filter((record) => pluginId === undefined || record.pluginId === pluginId);
	}

	pendingCount(): number {
		return this.records.length;
	}

	/**
	 * Deliver every pending record, one sink call per plugin id in order of first error.
	 * Records are cleared before the sink is called and are never delivered twice.
	 * @returns ids of the plugins that had errors
	 */
	flush(sink: ErrorSink): string[] {
		const delivered = this.records;
		this.records = [];

		const byPlugin = new Map<string, ExecutionError[]>();
		for (const record of delivered) {
			const group = byPlugin.get(record.pluginId);
			if (group) {
				group.push(record);
			} else {
				byPlugin.set(record.pluginId, [record]);
			}
		}

		for (const [pluginId, group] of byPlugin) {
			sink.display(formatTitle(pluginId, group), group.map(formatRecord).join("\n"), "error");
		}
		return Array.from(byPlugin.keys());
	}
}

function formatTitle(pluginId: string, records: readonly ExecutionError[]): string {
	const hasLoading = records.some((record) => record.phase === "loading");
	const hasRunning = records.some((record) => record.phase === "running");
	if (hasLoading && hasRunning) {
		return `Loading and running errors: ${pluginId}`;
	}
	return hasRunning ? `Running error: ${pluginId}` : `Loading error: ${pluginId}`;
}

function formatRecord(record: ExecutionError): string {
	if (record.phase === "running" && record.cause instanceof Error && record.cause.stack) {
		return record.cause.stack.includes(record.message)
			? record.cause.stack
			: `${record.message}\n${record.cause.stack}`;
	}
	return record.message;
}
