import fs from "fs";
import dotenv from "dotenv";
import { ConfigError, loadConfig, type Config } from "../config/index.js";
import { ConsoleLogger, type Logger } from "../services/sync/logger.js";

export interface GlobalOptions {
	config: string;
	logLevel?: string;
}

export interface CliContext {
	config: Config;
	logger: Logger;
}

/**
 * Load the dotenv file (if any), then `./.env`, then validate. Variables
 * already set in the environment win over both files.
 */
export function loadContext(options: GlobalOptions, configFileExplicit: boolean): CliContext {
	if (fs.existsSync(options.config)) {
		dotenv.config({ path: options.config });
	} else if (configFileExplicit) {
		throw new ConfigError([`config file not found: ${options.config}`]);
	}
	dotenv.config();

	const env = options.logLevel ? { ...process.env, LOG_LEVEL: options.logLevel } : process.env;
	const config = loadConfig(env);
	const logger = new ConsoleLogger({ level: config.logLevel });
	return { config, logger };
}

/**
 * Call `handler` once on the first SIGINT or SIGTERM. Returns a function that
 * removes the listeners.
 */
export function onShutdownSignal(handler: (signal: NodeJS.Signals) => void): () => void {
	const listener = (signal: NodeJS.Signals) => {
		dispose();
		handler(signal);
	};
	const dispose = () => {
		process.off("SIGINT", listener);
		process.off("SIGTERM", listener);
	};
	process.on("SIGINT", listener);
	process.on("SIGTERM", listener);
	return dispose;
}
