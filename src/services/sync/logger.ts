import pc from "picocolors";
import type { LogLevel } from "../../config/index.js";

export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
	child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
	debug: pc.dim("DEBUG"),
	info: pc.cyan("INFO "),
	warn: pc.yellow("WARN "),
	error: pc.red("ERROR"),
};

export interface ConsoleLoggerOptions {
	level?: LogLevel;
	scope?: string;
}

export class ConsoleLogger implements Logger {
	private readonly level: LogLevel;
	private readonly scope: string;

	constructor(options: ConsoleLoggerOptions = {}) {
		this.level = options.level ?? "info";
		this.scope = options.scope ?? "catalog-sync";
	}

	debug(message: string): void {
		this.write("debug", message);
	}

	info(message: string): void {
		this.write("info", message);
	}

	warn(message: string): void {
		this.write("warn", message);
	}

	error(message: string): void {
		this.write("error", message);
	}

	child(scope: string): Logger {
		return new ConsoleLogger({ level: this.level, scope: `${this.scope}.${scope}` });
	}

	private write(level: LogLevel, message: string): void {
		if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

		const time = new Date().toLocaleTimeString("en-GB", { hour12: false });
		const line = `${pc.dim(time)} ${LEVEL_LABELS[level]} ${pc.dim(`[${this.scope}]`)} ${message}`;
		if (level === "error" || level === "warn") {
			console.error(line);
		} else {
			console.log(line);
		}
	}
}

export interface ScanSummary {
	filesSeen: number;
	tracksQueued: number;
	tracksDelivered: number;
	batchesSent: number;
	batchesFailed: number;
	skippedFiles: number;
	duration: number; // milliseconds
}

/**
 * Log scan start
 */
export function logScanStart(
	logger: Logger,
	options: { musicRootPath: string; batchSize: number; lastScanTime: number }
): void {
	const since = options.lastScanTime > 0 ? new Date(options.lastScanTime * 1000).toISOString() : "never";
	logger.info("═══════════════════════════════════════════════════════════");
	logger.info("  Starting Library Scan");
	logger.info(`  Music Root: ${options.musicRootPath}`);
	logger.info(`  Batch Size: ${options.batchSize}`);
	logger.info(`  Last Scan:  ${since}`);
	logger.info("═══════════════════════════════════════════════════════════");
}

/**
 * Log scan complete with summary
 */
export function logScanComplete(logger: Logger, summary: ScanSummary): void {
	const durationSeconds = (summary.duration / 1000).toFixed(1);

	logger.info("═══════════════════════════════════════════════════════════");
	logger.info("  Scan Complete");
	logger.info(`  Files Seen: ${summary.filesSeen}`);
	logger.info(`  Tracks Delivered: ${summary.tracksDelivered}/${summary.tracksQueued}`);
	logger.info(`  Batches Sent: ${summary.batchesSent}`);
	if (summary.batchesFailed > 0) {
		logger.warn(`  Batches Failed: ${summary.batchesFailed}`);
	}
	if (summary.skippedFiles > 0) {
		logger.info(`  Files Skipped: ${summary.skippedFiles}`);
	}
	logger.info(`  Duration: ${durationSeconds}s`);
	logger.info("═══════════════════════════════════════════════════════════");
}
