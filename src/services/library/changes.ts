import fs from "fs/promises";
import path from "path";
import { errorMessage } from "../../utils/index.js";
import type { Logger } from "../sync/logger.js";
import { readEntries } from "./scanner.js";

/**
 * Latest modification time (Unix seconds) of the library: the root directory's
 * own mtime or the newest mtime of any regular file beneath it, whichever is
 * later. Symlinks are skipped; entries that cannot be stat-ed are logged and
 * left out. Throws only if the root itself cannot be stat-ed.
 */
export async function latestModificationTime(root: string, logger: Logger): Promise<number> {
	const rootPath = path.resolve(root);
	const rootStats = await fs.stat(rootPath);
	let latest = rootStats.mtimeMs;
	const stack = [rootPath];

	while (stack.length > 0) {
		const dir = stack.pop();
		if (dir === undefined) break;

		const entries = await readEntries(dir, logger);
		if (!entries) continue;

		for (const entry of entries) {
			const fullPath = path.join(dir, entry.name);
			if (entry.isSymbolicLink()) continue;

			if (entry.isDirectory()) {
				stack.push(fullPath);
			} else if (entry.isFile()) {
				try {
					const stats = await fs.lstat(fullPath);
					latest = Math.max(latest, stats.mtimeMs);
				} catch (error) {
					logger.error(`Error checking modification time of ${fullPath}: ${errorMessage(error)}`);
				}
			}
		}
	}

	return latest / 1000;
}

/**
 * A scan is due only when something changed after the last completed scan.
 */
export function hasChangedSince(latestModification: number, lastScanTime: number): boolean {
	return latestModification > lastScanTime;
}
