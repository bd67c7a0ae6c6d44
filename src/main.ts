#!/usr/bin/env node

import { Command } from "commander";
import pc from "picocolors";
import { loadContext, type GlobalOptions } from "./cli/context.js";
import { runCommand, type RunOptions } from "./cli/run.js";
import { sendCommand } from "./cli/send.js";
import { showCommand } from "./cli/show.js";
import { syncCommand } from "./cli/sync.js";
import { APP_NAME, defaultConfigFile } from "./config/index.js";
import { errorMessage } from "./utils/index.js";

const program = new Command();

program
	.name(APP_NAME)
	.description("Scan a music library and keep a catalog server's track metadata in sync")
	.version("0.4.0")
	.option("-c, --config <file>", "Configuration file (dotenv format)", defaultConfigFile())
	.option("--log-level <level>", "Log level: debug, info, warn, error");

function context() {
	const explicit = program.getOptionValueSource("config") === "cli";
	return loadContext(program.opts<GlobalOptions>(), explicit);
}

function fatal(e: unknown): never {
	console.error(pc.red("Error:"), errorMessage(e));
	process.exit(1);
}

program
	.command("run", { isDefault: true })
	.description("Scan now and then on schedule until stopped")
	.option("--run-once", "Run the scan once and exit")
	.option("--dont-scan-now", "Don't run the scan immediately")
	.action((opts: RunOptions) => {
		runCommand(context(), opts).catch(fatal);
	});

program
	.command("show")
	.description("Show the metadata that would be sent to the server for a music file")
	.argument("<file>", "Path to music file")
	.action((file: string) => {
		showCommand(file).catch(fatal);
	});

program
	.command("send")
	.description("Send one music file's metadata to the server")
	.argument("<file>", "Path to music file")
	.action((file: string) => {
		sendCommand(context(), file).catch(fatal);
	});

program
	.command("sync")
	.description("Send every music file in a directory to the server, ignoring the last scan time")
	.argument("[dir]", "Directory to process (default: the music root)")
	.action((dir: string | undefined) => {
		syncCommand(context(), dir).catch(fatal);
	});

try {
	program.parse();
} catch (e) {
	fatal(e);
}
