import fs from "fs";
import path from "path";
import ora from "ora";
import pc from "picocolors";
import { CatalogClient } from "../services/catalog/client.js";
import { libraryRelativePath } from "../services/library/scanner.js";
import { extractMetadata } from "../services/metadata/index.js";
import { isEmptyMetadata } from "../services/metadata/types.js";
import type { CliContext } from "./context.js";

/**
 * Path to report for `file`: relative to the library root when it lives there,
 * otherwise just the file name.
 */
export function reportedPath(musicRootPath: string, file: string): string {
	const relative = libraryRelativePath(musicRootPath, path.resolve(file));
	if (relative.startsWith("../") || relative === ".." || path.isAbsolute(relative)) {
		return path.basename(file);
	}
	return relative;
}

/**
 * Submit a single file's metadata outside the scheduled scan.
 */
export async function sendCommand({ config, logger }: CliContext, file: string): Promise<void> {
	if (!fs.existsSync(file)) {
		console.error(pc.red(`  ✗ File ${file} does not exist`));
		process.exitCode = 1;
		return;
	}

	const catalog = CatalogClient.fromConfig(config, logger.child("catalog"));
	const spinner = ora("Checking server health...").start();

	const health = await catalog.checkHealth();
	if (!health.ok) {
		spinner.fail(`Server is not healthy (${health.kind})`);
		process.exitCode = 1;
		return;
	}

	spinner.text = `Reading ${path.basename(file)}...`;
	const metadata = await extractMetadata(file);
	if (!metadata.ok) {
		spinner.fail(`Could not read ${file}: ${metadata.detail}`);
		process.exitCode = 1;
		return;
	}
	if (isEmptyMetadata(metadata.value)) {
		spinner.warn(`No metadata found in ${file}, nothing sent`);
		return;
	}

	const filePath = reportedPath(config.music.rootPath, file);
	spinner.text = `Sending ${filePath}...`;
	const result = await catalog.sendTrack({ file_path: filePath, metadata: metadata.value });
	if (result.ok) {
		spinner.succeed(`Sent ${pc.cyan(filePath)}`);
	} else {
		spinner.fail(`Failed to send ${filePath}: ${result.detail}`);
		process.exitCode = 1;
	}
}
