import type { CatalogApi } from "../catalog/client.js";
import type { TrackRecord } from "../metadata/types.js";
import type { Logger } from "./logger.js";

export interface BatchStats {
	tracksQueued: number;
	tracksDelivered: number;
	batchesSent: number;
	batchesFailed: number;
}

export interface BatchAccumulatorOptions {
	catalog: CatalogApi;
	batchSize: number;
	logger: Logger;
	signal?: AbortSignal;
}

/**
 * Collects track records and ships them to the catalog in batches of at most
 * `batchSize`. A failed delivery is counted and logged; accumulation goes on.
 * Once `signal` is aborted nothing more is sent.
 */
export class BatchAccumulator {
	private readonly catalog: CatalogApi;
	private readonly batchSize: number;
	private readonly logger: Logger;
	private readonly signal?: AbortSignal;
	private batch: TrackRecord[] = [];
	private finished = false;
	private readonly stats: BatchStats = {
		tracksQueued: 0,
		tracksDelivered: 0,
		batchesSent: 0,
		batchesFailed: 0,
	};

	constructor(options: BatchAccumulatorOptions) {
		if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
			throw new RangeError(`batchSize must be a positive integer, got ${options.batchSize}`);
		}
		this.catalog = options.catalog;
		this.batchSize = options.batchSize;
		this.logger = options.logger;
		this.signal = options.signal;
	}

	get pending(): number {
		return this.batch.length;
	}

	/**
	 * Counters so far
	 */
	get summary(): Readonly<BatchStats> {
		return { ...this.stats };
	}

	/**
	 * True when every batch handed to the catalog was accepted.
	 */
	get allDelivered(): boolean {
		return this.stats.batchesFailed === 0;
	}

	async add(record: TrackRecord): Promise<void> {
		if (this.finished) {
			throw new Error("Cannot add to a finished batch accumulator");
		}
		this.batch.push(record);
		this.stats.tracksQueued++;

		if (this.batch.length >= this.batchSize) {
			await this.flush();
		}
	}

	/**
	 * Send the remainder, if any. Safe to call more than once.
	 */
	async finish(): Promise<void> {
		if (this.finished) return;
		this.finished = true;
		if (this.batch.length > 0) {
			await this.flush();
		}
	}

	private async flush(): Promise<void> {
		const batch = this.batch;
		this.batch = [];

		if (this.signal?.aborted) {
			this.logger.info(`Cancellation requested, dropping batch of ${batch.length} tracks`);
			return;
		}

		const result = await this.catalog.sendBatch(batch);
		if (result.ok) {
			this.stats.batchesSent++;
			this.stats.tracksDelivered += batch.length;
		} else {
			this.stats.batchesFailed++;
			this.logger.debug(`Undelivered batch (${result.kind}): ${batch.map((t) => t.file_path).join(", ")}`);
		}
	}
}
