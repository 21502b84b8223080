import type { ErrorSeverity, ErrorSink, Logger } from "@scriptplug/plugin-runner-core";

/**
 * Error sink that prints grouped plugin errors through a logger
 */
export class ConsoleErrorSink implements ErrorSink {
	private logger: Logger;
	private displayedCount = 0;

	constructor(logger: Logger) {
		this.logger = logger;
	}

	display(title: string, message: string, severity: ErrorSeverity = "error"): void {
		this.displayedCount++;
		if (severity === "warning") {
			this.logger.warn(`${title}\n${message}`);
		} else {
			this.logger.error(`${title}\n${message}`);
		}
	}

	/**
	 * Number of messages displayed so far
	 */
	count(): number {
		return this.displayedCount;
	}
}
