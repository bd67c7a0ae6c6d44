import type { LogLevel } from "../config/index.js";
import type { Logger } from "../services/sync/logger.js";

export interface LogEntry {
	level: LogLevel;
	scope: string;
	message: string;
}

/**
 * Logger for tests: keeps every entry instead of printing it.
 */
export class RecordingLogger implements Logger {
	constructor(
		readonly entries: LogEntry[] = [],
		private readonly scope = "test"
	) {}

	debug(message: string): void {
		this.entries.push({ level: "debug", scope: this.scope, message });
	}

	info(message: string): void {
		this.entries.push({ level: "info", scope: this.scope, message });
	}

	warn(message: string): void {
		this.entries.push({ level: "warn", scope: this.scope, message });
	}

	error(message: string): void {
		this.entries.push({ level: "error", scope: this.scope, message });
	}

	child(scope: string): Logger {
		return new RecordingLogger(this.entries, `${this.scope}.${scope}`);
	}

	messages(level: LogLevel): string[] {
		return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
	}
}
