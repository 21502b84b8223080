import type { Logger } from "@scriptplug/plugin-runner-core";
import { LOG_LEVELS, type LogLevel } from "../config";

/**
 * Console implementation of the Logger interface.
 * Uses console with a prefix for easy filtering; messages below `level` are dropped.
 */
export class ConsoleLogger implements Logger {
	private prefix: string;
	private threshold: number;

	constructor(prefix: string = "[scriptplug]", level: LogLevel = "info") {
		this.prefix = prefix;
		this.threshold = LOG_LEVELS.indexOf(level);
	}

	debug(message: string, ...args: unknown[]): void {
		if (this.enabled("debug")) {
			console.debug(this.prefix, message, ...args);
		}
	}

	info(message: string, ...args: unknown[]): void {
		if (this.enabled("info")) {
			console.info(this.prefix, message, ...args);
		}
	}

	warn(message: string, ...args: unknown[]): void {
		if (this.enabled("warn")) {
			console.warn(this.prefix, message, ...args);
		}
	}

	error(message: string, ...args: unknown[]): void {
		console.error(this.prefix, message, ...args);
	}

	private enabled(level: LogLevel): boolean {
		return LOG_LEVELS.indexOf(level) >= this.threshold;
	}
}
