import fs from "fs";
import path from "path";
import pc from "picocolors";
import { extractMetadata } from "../services/metadata/index.js";
import type { TrackRecord } from "../services/metadata/types.js";

/**
 * Print the request body that would be sent to the catalog for one file.
 */
export async function showCommand(file: string): Promise<void> {
	if (!fs.existsSync(file)) {
		console.error(pc.red(`  ✗ File ${file} does not exist`));
		process.exitCode = 1;
		return;
	}

	const result = await extractMetadata(file);
	if (!result.ok) {
		console.error(pc.red(`  ✗ Could not read ${file}: ${result.detail}`));
		process.exitCode = 1;
		return;
	}

	const request: TrackRecord = {
		file_path: path.basename(file),
		metadata: result.value,
	};

	console.log();
	console.log(pc.bold(pc.blue("  Request that would be sent to server:")));
	console.log(JSON.stringify(request, null, 2));
}
