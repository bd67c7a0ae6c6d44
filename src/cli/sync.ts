import cliProgress from "cli-progress";
import pc from "picocolors";
import { CatalogClient } from "../services/catalog/client.js";
import { ScanStateStore } from "../services/sync/state.js";
import { LibrarySync, type ScanResult } from "../services/sync/sync.js";
import { onShutdownSignal, type CliContext } from "./context.js";

function createProgressBar() {
	return new cliProgress.SingleBar({
		format: pc.dim("  │ ") + pc.cyan("{bar}") + pc.dim(" │ ") + pc.white("{percentage}%") + pc.dim(" │ ") + pc.dim("{value}/{total} files"),
		barCompleteChar: "█",
		barIncompleteChar: "░",
		hideCursor: true,
		clearOnComplete: false,
		barsize: 25,
	});
}

/**
 * Send every file under `directory` (default: the music root) to the catalog,
 * ignoring the scan checkpoint. Used to repopulate an emptied catalog.
 */
export async function syncCommand({ config, logger }: CliContext, directory?: string): Promise<void> {
	const state = new ScanStateStore(config.statePath, logger.child("state"));
	const catalog = CatalogClient.fromConfig(config, logger.child("catalog"));
	const sync = LibrarySync.fromConfig(config, { catalog, state, logger: logger.child("sync") });

	const controller = new AbortController();
	const dispose = onShutdownSignal((signal) => {
		logger.info(`${signal} received, stopping batch processing...`);
		controller.abort();
	});

	const progressBar = createProgressBar();
	let started = false;
	let result: ScanResult;
	try {
		result = await sync.syncDirectory(directory ?? config.music.rootPath, {
			signal: controller.signal,
			onStart: (total) => {
				started = true;
				progressBar.start(total, 0);
			},
			onFileComplete: (done) => progressBar.update(done),
		});
	} finally {
		if (started) progressBar.stop();
		dispose();
	}

	const { summary } = result;
	if (result.status === "completed") {
		console.log(
			pc.green(`  ✓ ${summary.tracksDelivered} tracks sent`) +
				pc.dim(` (${summary.skippedFiles} skipped, ${summary.batchesFailed} failed batches)`)
		);
	} else {
		console.error(pc.red(`  ✗ Batch processing ${result.status}`));
	}
	if (result.status !== "completed" || summary.batchesFailed > 0) {
		process.exitCode = 1;
	}
}
