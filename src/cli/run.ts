import { APP_NAME, type Config } from "../config/index.js";
import { CatalogClient } from "../services/catalog/client.js";
import { ScanScheduler, type Schedule } from "../services/sync/scheduler.js";
import { ScanStateStore } from "../services/sync/state.js";
import { LibrarySync } from "../services/sync/sync.js";
import { onShutdownSignal, type CliContext } from "./context.js";

export interface RunOptions {
	runOnce?: boolean;
	dontScanNow?: boolean;
}

export function scheduleFromConfig(config: Config): Schedule {
	if (config.scan.intervalMinutes !== undefined) {
		return { kind: "interval", minutes: config.scan.intervalMinutes };
	}
	return { kind: "daily", time: config.scan.scanTime };
}

export function describeSchedule(schedule: Schedule): string {
	return schedule.kind === "interval" ? `every ${schedule.minutes} min` : `daily at ${schedule.time}`;
}

/**
 * Long-running mode: scan now (unless told not to), then on schedule until
 * SIGINT/SIGTERM.
 */
export async function runCommand({ config, logger }: CliContext, options: RunOptions): Promise<void> {
	const state = new ScanStateStore(config.statePath, logger.child("state"));
	const catalog = CatalogClient.fromConfig(config, logger.child("catalog"));
	const sync = LibrarySync.fromConfig(config, { catalog, state, logger: logger.child("scan") });
	const schedule = scheduleFromConfig(config);
	const scheduler = new ScanScheduler({
		schedule,
		run: (signal) => sync.scan(signal),
		logger: logger.child("scheduler"),
	});

	logger.info(`Starting ${APP_NAME} (${describeSchedule(schedule)}, state: ${state.path})`);

	const stopped = new Promise<void>((resolve) => {
		const dispose = onShutdownSignal((signal) => {
			logger.info(`${signal} received, shutting down gracefully...`);
			void scheduler.stop().then(resolve);
		});
		if (options.runOnce) {
			const first = options.dontScanNow ? Promise.resolve(null) : scheduler.trigger();
			void first.then(() => {
				dispose();
				logger.info("Run once flag set, exiting");
				resolve();
			});
		}
	});

	if (!options.runOnce) {
		if (!options.dontScanNow) {
			void scheduler.trigger();
		}
		scheduler.start();
	}

	await stopped;
	logger.info(`Shutting down ${APP_NAME}`);
}
