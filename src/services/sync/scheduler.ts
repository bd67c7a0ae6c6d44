import { errorMessage } from "../../utils/index.js";
import type { Logger } from "./logger.js";
import type { ScanResult } from "./sync.js";

export type ScanRunner = (signal: AbortSignal) => Promise<ScanResult>;

export type Schedule = { kind: "daily"; time: string } | { kind: "interval"; minutes: number };

export interface ScanSchedulerOptions {
	schedule: Schedule;
	run: ScanRunner;
	logger: Logger;
	now?: () => Date;
}

/**
 * Milliseconds from `now` until the next local wall-clock `HH:MM`.
 * A time equal to `now` is scheduled for the following day.
 */
export function msUntilNextDailyRun(time: string, now: Date): number {
	const [hours, minutes] = time.split(":").map((part) => Number(part));
	const next = new Date(now.getTime());
	next.setHours(hours, minutes, 0, 0);
	if (next.getTime() <= now.getTime()) {
		next.setDate(next.getDate() + 1);
	}
	return next.getTime() - now.getTime();
}

/**
 * Triggers scans on a schedule, never more than one at a time. A trigger that
 * fires while a scan is running is skipped.
 */
export class ScanScheduler {
	private readonly options: ScanSchedulerOptions;
	private readonly logger: Logger;
	private readonly now: () => Date;
	private timer: NodeJS.Timeout | null = null;
	private active: { controller: AbortController; done: Promise<ScanResult | null> } | null = null;
	private stopped = false;

	constructor(options: ScanSchedulerOptions) {
		this.options = options;
		this.logger = options.logger;
		this.now = options.now ?? (() => new Date());
	}

	get running(): boolean {
		return this.active !== null;
	}

	start(): void {
		this.stopped = false;
		this.scheduleNext();
	}

	nextDelay(): number {
		const { schedule } = this.options;
		if (schedule.kind === "interval") {
			return schedule.minutes * 60_000;
		}
		return msUntilNextDailyRun(schedule.time, this.now());
	}

	/**
	 * Run a scan now unless one is already in progress. Resolves with the
	 * scan result, or null when skipped or when the scan threw.
	 */
	async trigger(): Promise<ScanResult | null> {
		if (this.active) {
			this.logger.warn("A scan is already running, ignoring trigger");
			return null;
		}

		const controller = new AbortController();
		const done = this.options
			.run(controller.signal)
			.then((result) => {
				this.logger.info(`Scan finished: ${result.status}`);
				return result;
			})
			.catch((error: unknown) => {
				this.logger.error(`Scan failed: ${errorMessage(error)}`);
				return null;
			})
			.finally(() => {
				this.active = null;
			});

		this.active = { controller, done };
		return done;
	}

	/**
	 * Stop scheduling, cancel the running scan and wait for it to wind down.
	 */
	async stop(): Promise<void> {
		this.stopped = true;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
		if (this.active) {
			this.active.controller.abort();
			await this.active.done;
		}
	}

	private scheduleNext(): void {
		if (this.stopped) return;
		const delay = this.nextDelay();
		this.logger.debug(`Next scan in ${Math.round(delay / 1000)}s`);

		this.timer = setTimeout(() => {
			this.timer = null;
			void this.trigger()
				.catch((error: unknown) => this.logger.error(`Scheduled scan failed: ${errorMessage(error)}`))
				.finally(() => this.scheduleNext());
		}, delay);
	}
}
