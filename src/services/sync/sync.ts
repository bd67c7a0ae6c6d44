import fs from "fs/promises";
import path from "path";
import type { CheckpointPolicy, Config } from "../../config/index.js";
import { errorMessage } from "../../utils/index.js";
import type { CatalogApi } from "../catalog/client.js";
import { hasChangedSince, latestModificationTime } from "../library/changes.js";
import { findIgnoredDirectories, libraryRelativePath, walkLibrary } from "../library/scanner.js";
import { extractMetadata } from "../metadata/index.js";
import { isEmptyMetadata, type ExtractResult, type MetadataExtractor } from "../metadata/types.js";
import { BatchAccumulator } from "./batcher.js";
import { logScanComplete, logScanStart, type Logger, type ScanSummary } from "./logger.js";

export type ScanPhase =
	| "idle"
	| "change-check"
	| "health-check"
	| "walking"
	| "flush-remainder"
	| "complete"
	| "aborted";

export type ScanStatus = "missing-root" | "unchanged" | "unhealthy" | "cancelled" | "completed";

export interface ScanResult {
	status: ScanStatus;
	summary: ScanSummary;
	checkpointSaved: boolean;
	startedAt: number; // Unix seconds
}

export interface CheckpointStore {
	getLastScanTime(): Promise<number>;
	saveLastScanTime(timestamp: number): Promise<boolean>;
}

export interface LibrarySyncOptions {
	musicRootPath: string;
	extensions: readonly string[];
	ignoreMarker: string;
	batchSize: number;
	checkpointPolicy: CheckpointPolicy;
	catalog: CatalogApi;
	state: CheckpointStore;
	logger: Logger;
	extract?: MetadataExtractor;
	/** Unix seconds; injectable for tests */
	now?: () => number;
}

export interface FullSyncOptions {
	signal?: AbortSignal;
	/** Called once with the number of candidate files before any is read */
	onStart?: (total: number) => void;
	onFileComplete?: (done: number, total: number) => void;
}

function emptySummary(): ScanSummary {
	return {
		filesSeen: 0,
		tracksQueued: 0,
		tracksDelivered: 0,
		batchesSent: 0,
		batchesFailed: 0,
		skippedFiles: 0,
		duration: 0,
	};
}

/**
 * One scan-and-sync pass over the music library.
 *
 * A pass checks for changes since the last checkpoint, health-checks the
 * catalog, walks the library, extracts and batches metadata, and finally
 * commits the checkpoint. Only a completed walk moves the checkpoint; a
 * cancelled or skipped pass leaves it untouched so the same time window is
 * looked at again next time.
 */
export class LibrarySync {
	private readonly options: LibrarySyncOptions;
	private readonly logger: Logger;
	private readonly extract: MetadataExtractor;
	private readonly now: () => number;
	private currentPhase: ScanPhase = "idle";

	constructor(options: LibrarySyncOptions) {
		this.options = options;
		this.logger = options.logger;
		this.extract = options.extract ?? extractMetadata;
		this.now = options.now ?? (() => Date.now() / 1000);
	}

	static fromConfig(
		config: Config,
		deps: { catalog: CatalogApi; state: CheckpointStore; logger: Logger; extract?: MetadataExtractor }
	): LibrarySync {
		return new LibrarySync({
			musicRootPath: config.music.rootPath,
			extensions: config.music.extensions,
			ignoreMarker: config.music.ignoreMarker,
			batchSize: config.scan.batchSize,
			checkpointPolicy: config.scan.checkpointPolicy,
			...deps,
		});
	}

	get phase(): ScanPhase {
		return this.currentPhase;
	}

	async scan(signal?: AbortSignal): Promise<ScanResult> {
		const startedAt = this.now();
		const startMs = Date.now();
		const root = this.options.musicRootPath;
		const finish = (status: ScanStatus, summary = emptySummary(), checkpointSaved = false): ScanResult => {
			this.currentPhase = status === "completed" ? "complete" : "aborted";
			return { status, summary, checkpointSaved, startedAt };
		};

		if (!(await isDirectory(root))) {
			this.logger.error(`Music directory does not exist: ${root}`);
			return finish("missing-root");
		}

		this.currentPhase = "change-check";
		const lastScanTime = await this.options.state.getLastScanTime();
		const latest = await latestModificationTime(root, this.logger);
		if (!hasChangedSince(latest, lastScanTime)) {
			this.logger.info("No changes in music library since last scan, skipping");
			return finish("unchanged");
		}

		this.currentPhase = "health-check";
		const health = await this.options.catalog.checkHealth();
		if (!health.ok) {
			// the client has already logged the failure itself
			this.logger.warn("Server is not healthy, skipping scan");
			return finish("unhealthy");
		}

		this.currentPhase = "walking";
		this.logger.info(`Changes detected, starting music directory scan: ${root}`);
		logScanStart(this.logger, { musicRootPath: root, batchSize: this.options.batchSize, lastScanTime });

		const summary = emptySummary();
		const accumulator = new BatchAccumulator({
			catalog: this.options.catalog,
			batchSize: this.options.batchSize,
			logger: this.logger,
			signal,
		});
		const ignoredDirectories = await findIgnoredDirectories(root, this.options.ignoreMarker, this.logger);
		const files = walkLibrary(root, {
			extensions: new Set(this.options.extensions),
			ignoredDirectories,
			logger: this.logger,
		});

		for await (const filePath of files) {
			if (signal?.aborted) {
				this.logger.info("Termination requested, stopping scan");
				return finish("cancelled", this.collect(summary, accumulator, startMs));
			}
			await this.processFile(root, filePath, summary, accumulator);
		}

		if (signal?.aborted) {
			this.logger.info("Termination requested, remainder not sent");
			return finish("cancelled", this.collect(summary, accumulator, startMs));
		}

		this.currentPhase = "flush-remainder";
		await accumulator.finish();

		const completed = this.collect(summary, accumulator, startMs);
		const checkpointSaved = await this.commit(startedAt, accumulator.allDelivered, completed);
		logScanComplete(this.logger, completed);
		return finish("completed", completed, checkpointSaved);
	}

	/**
	 * One-off full pass over `directory`: every candidate file is read and sent,
	 * whatever the checkpoint says, and the checkpoint is left alone. Paths in
	 * the records are relative to `directory`.
	 */
	async syncDirectory(directory: string, options: FullSyncOptions = {}): Promise<ScanResult> {
		const { signal } = options;
		const startedAt = this.now();
		const startMs = Date.now();
		const root = path.resolve(directory);
		const finish = (status: ScanStatus, summary = emptySummary()): ScanResult => {
			this.currentPhase = status === "completed" ? "complete" : "aborted";
			return { status, summary, checkpointSaved: false, startedAt };
		};

		if (!(await isDirectory(root))) {
			this.logger.error(`Directory ${root} does not exist`);
			return finish("missing-root");
		}

		this.currentPhase = "health-check";
		const health = await this.options.catalog.checkHealth();
		if (!health.ok) {
			this.logger.warn("Server is not healthy, skipping batch processing");
			return finish("unhealthy");
		}

		this.currentPhase = "walking";
		this.logger.info(`Starting batch processing of directory: ${root}`);
		const ignoredDirectories = await findIgnoredDirectories(root, this.options.ignoreMarker, this.logger);
		const files: string[] = [];
		for await (const filePath of walkLibrary(root, {
			extensions: new Set(this.options.extensions),
			ignoredDirectories,
			logger: this.logger,
		})) {
			files.push(filePath);
		}

		if (files.length === 0) {
			this.logger.info("No music files found");
			return finish("completed");
		}

		const summary = emptySummary();
		const accumulator = new BatchAccumulator({
			catalog: this.options.catalog,
			batchSize: this.options.batchSize,
			logger: this.logger,
			signal,
		});
		options.onStart?.(files.length);

		for (const [index, filePath] of files.entries()) {
			if (signal?.aborted) {
				this.logger.info("Termination requested, stopping batch processing");
				return finish("cancelled", this.collect(summary, accumulator, startMs));
			}
			await this.processFile(root, filePath, summary, accumulator);
			options.onFileComplete?.(index + 1, files.length);
		}

		if (signal?.aborted) {
			this.logger.info("Termination requested, remainder not sent");
			return finish("cancelled", this.collect(summary, accumulator, startMs));
		}

		this.currentPhase = "flush-remainder";
		await accumulator.finish();

		const completed = this.collect(summary, accumulator, startMs);
		logScanComplete(this.logger, completed);
		return finish("completed", completed);
	}

	private async processFile(
		root: string,
		filePath: string,
		summary: ScanSummary,
		accumulator: BatchAccumulator
	): Promise<void> {
		summary.filesSeen++;
		const relativePath = libraryRelativePath(root, filePath);
		const result = await this.safeExtract(filePath);

		if (!result.ok) {
			this.logger.error(`Error processing ${relativePath}: ${result.detail}`);
			summary.skippedFiles++;
			return;
		}
		if (isEmptyMetadata(result.value)) {
			this.logger.debug(`No metadata in ${relativePath}, skipping`);
			summary.skippedFiles++;
			return;
		}

		await accumulator.add({ file_path: relativePath, metadata: result.value });
	}

	private async commit(startedAt: number, allDelivered: boolean, summary: ScanSummary): Promise<boolean> {
		if (this.options.checkpointPolicy === "all-delivered" && !allDelivered) {
			this.logger.warn(
				`${summary.batchesFailed} batch(es) were not delivered, keeping the previous checkpoint so the next scan retries`
			);
			return false;
		}
		return this.options.state.saveLastScanTime(startedAt);
	}

	private async safeExtract(filePath: string): Promise<ExtractResult> {
		try {
			return await this.extract(filePath);
		} catch (error) {
			return { ok: false, kind: "unreadable", detail: errorMessage(error) };
		}
	}

	private collect(summary: ScanSummary, accumulator: BatchAccumulator, startMs: number): ScanSummary {
		return {
			...summary,
			...accumulator.summary,
			duration: Date.now() - startMs,
		};
	}
}

async function isDirectory(dir: string): Promise<boolean> {
	try {
		return (await fs.stat(dir)).isDirectory();
	} catch {
		return false;
	}
}
