/**
 * Persistence for the scan checkpoint: the Unix time (seconds) of the last
 * fully completed scan. This is the only durable state of the sync client.
 */

import fs from "fs/promises";
import path from "path";
import { z } from "zod";
import { errorMessage } from "../../utils/index.js";
import type { Logger } from "./logger.js";

const checkpointSchema = z.object({
	lastScanTime: z.number().finite().nonnegative(),
});

export type ScanCheckpoint = z.infer<typeof checkpointSchema>;

export class ScanStateStore {
	private readonly statePath: string;
	private readonly logger: Logger;

	constructor(statePath: string, logger: Logger) {
		this.statePath = statePath;
		this.logger = logger;
	}

	get path(): string {
		return this.statePath;
	}

	/**
	 * Returns 0 when there is no checkpoint yet or it cannot be read.
	 */
	async getLastScanTime(): Promise<number> {
		let content: string;
		try {
			content = await fs.readFile(this.statePath, "utf-8");
		} catch (error) {
			if (isMissingFile(error)) {
				return 0;
			}
			this.logger.error(`Error reading state file ${this.statePath}: ${errorMessage(error)}`);
			return 0;
		}

		try {
			const parsed = checkpointSchema.safeParse(JSON.parse(content));
			if (!parsed.success) {
				this.logger.error(`Ignoring malformed state file ${this.statePath}`);
				return 0;
			}
			return parsed.data.lastScanTime;
		} catch (error) {
			this.logger.error(`Error parsing state file ${this.statePath}: ${errorMessage(error)}`);
			return 0;
		}
	}

	/**
	 * Write the checkpoint through a temporary file so a crash never leaves a
	 * half-written document. A value older than the stored one is not written.
	 * Failures are logged and reported as `false`.
	 */
	async saveLastScanTime(timestamp: number): Promise<boolean> {
		const previous = await this.getLastScanTime();
		const checkpoint: ScanCheckpoint = { lastScanTime: Math.max(previous, timestamp) };
		const tempPath = `${this.statePath}.${process.pid}.tmp`;

		try {
			await fs.mkdir(path.dirname(this.statePath), { recursive: true });
			await fs.writeFile(tempPath, JSON.stringify(checkpoint, null, 2), "utf-8");
			await fs.rename(tempPath, this.statePath);
			this.logger.debug(`Saved scan checkpoint ${checkpoint.lastScanTime}`);
			return true;
		} catch (error) {
			this.logger.error(`Error saving state file ${this.statePath}: ${errorMessage(error)}`);
			await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
				this.logger.debug(`Could not remove ${tempPath}: ${errorMessage(cleanupError)}`);
			});
			return false;
		}
	}
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}
