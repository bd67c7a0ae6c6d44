import fs from "fs/promises";
import type { Dirent } from "fs";
import path from "path";
import { errorMessage, normalizePath } from "../../utils/index.js";
import type { Logger } from "../sync/logger.js";

export interface WalkOptions {
	extensions: ReadonlySet<string>;
	ignoredDirectories: ReadonlySet<string>;
	logger: Logger;
}

/**
 * Check if a file is a candidate based on its extension (case-insensitive)
 */
export function hasWantedExtension(filePath: string, extensions: ReadonlySet<string>): boolean {
	return extensions.has(path.extname(filePath).toLowerCase());
}

/**
 * Read a directory, logging and returning null when it cannot be read.
 */
export async function readEntries(dir: string, logger: Logger): Promise<Dirent[] | null> {
	try {
		return await fs.readdir(dir, { withFileTypes: true });
	} catch (error) {
		logger.error(`Error accessing ${dir}: ${errorMessage(error)}`);
		return null;
	}
}

/**
 * Every directory below `root` (root included) that holds an ignore marker.
 * Symlinked directories are not entered.
 */
export async function findIgnoredDirectories(
	root: string,
	marker: string,
	logger: Logger
): Promise<Set<string>> {
	const ignored = new Set<string>();
	const stack = [path.resolve(root)];

	while (stack.length > 0) {
		const dir = stack.pop();
		if (dir === undefined) break;

		const entries = await readEntries(dir, logger);
		if (!entries) continue;

		for (const entry of entries) {
			if (entry.isDirectory()) {
				stack.push(path.join(dir, entry.name));
			} else if (entry.name === marker) {
				ignored.add(dir);
				logger.debug(`Ignoring directory: ${dir}`);
			}
		}
	}

	return ignored;
}

/**
 * Lazily yield the absolute paths of candidate files under `root`.
 *
 * Directories are visited depth-first in name order. Symlinks are neither
 * reported nor followed, and directories in `ignoredDirectories` are pruned
 * together with everything beneath them.
 */
export async function* walkLibrary(root: string, options: WalkOptions): AsyncGenerator<string> {
	const { extensions, ignoredDirectories, logger } = options;
	const stack = [path.resolve(root)];

	while (stack.length > 0) {
		const dir = stack.pop();
		if (dir === undefined) break;
		if (ignoredDirectories.has(dir)) continue;

		const entries = await readEntries(dir, logger);
		if (!entries) continue;

		entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
		const subdirectories: string[] = [];

		for (const entry of entries) {
			const fullPath = path.join(dir, entry.name);
			if (entry.isSymbolicLink()) {
				continue;
			}
			if (entry.isDirectory()) {
				subdirectories.push(fullPath);
			} else if (entry.isFile() && hasWantedExtension(entry.name, extensions)) {
				yield fullPath;
			}
		}

		// reversed so that the stack pops them in name order
		for (let i = subdirectories.length - 1; i >= 0; i--) {
			stack.push(subdirectories[i]);
		}
	}
}

/**
 * Path of `filePath` relative to the library root, always with forward slashes
 */
export function libraryRelativePath(root: string, filePath: string): string {
	return normalizePath(path.relative(path.resolve(root), filePath));
}
