import os from "os";
import path from "path";
import { z } from "zod";

export const APP_NAME = "catalog-sync";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const CHECKPOINT_POLICIES = ["always", "all-delivered"] as const;
export type CheckpointPolicy = (typeof CHECKPOINT_POLICIES)[number];

const endpointSchema = z.string().startsWith("/", "must start with '/'");

const intFromEnv = z
	.string()
	.transform((value) => Number(value))
	.pipe(z.number().int());

const configSchema = z.object({
	music: z.object({
		rootPath: z.string().min(1),
		extensions: z.array(z.string().regex(/^\.[a-z0-9]+$/, "must look like '.mp3'")).nonempty(),
		ignoreMarker: z.string().min(1),
	}),
	catalog: z.object({
		url: z.string().url(),
		port: z.number().int().min(1).max(65535),
		oneTrackEndpoint: endpointSchema,
		manyTracksEndpoint: endpointSchema,
		healthTimeoutMs: z.number().int().positive(),
	}),
	scan: z.object({
		batchSize: z.number().int().positive(),
		scanTime: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, "must be HH:MM"),
		intervalMinutes: z.number().int().positive().optional(),
		checkpointPolicy: z.enum(CHECKPOINT_POLICIES),
	}),
	statePath: z.string().min(1),
	logLevel: z.enum(LOG_LEVELS),
});

export type Config = z.infer<typeof configSchema>;

export class ConfigError extends Error {
	readonly issues: string[];

	constructor(issues: string[]) {
		super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
		this.name = "ConfigError";
		this.issues = issues;
	}
}

type Env = Record<string, string | undefined>;

export function defaultStatePath(env: Env = process.env): string {
	const stateHome = env.XDG_STATE_HOME || path.join(os.homedir(), ".local", "state");
	return path.join(stateHome, APP_NAME, "state.json");
}

export function defaultConfigFile(env: Env = process.env): string {
	const configHome = env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
	return path.join(configHome, APP_NAME, ".env");
}

/**
 * Accepts "mp3", ".MP3" or " .mp3 " and returns ".mp3".
 */
export function normalizeExtension(ext: string): string {
	const trimmed = ext.trim().toLowerCase();
	return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

function parseList(value: string | undefined, fallback: string): string[] {
	return (value || fallback)
		.split(",")
		.filter((item) => item.trim().length > 0)
		.map(normalizeExtension);
}

/**
 * Integer value of `key`, or undefined when unset, blank or invalid. Invalid
 * values are recorded in `issues`.
 */
function readOptionalInt(env: Env, key: string, issues: string[]): number | undefined {
	const raw = env[key];
	if (raw === undefined || raw.trim() === "") return undefined;
	const parsed = intFromEnv.safeParse(raw);
	if (!parsed.success) {
		issues.push(`${key}: expected an integer, got "${raw}"`);
		return undefined;
	}
	return parsed.data;
}

function readInt(env: Env, key: string, fallback: number, issues: string[]): number {
	return readOptionalInt(env, key, issues) ?? fallback;
}

/**
 * Build the configuration from environment variables. Call once at start-up and
 * hand the result to each component; nothing reads `process.env` afterwards.
 */
export function loadConfig(env: Env = process.env): Config {
	const issues: string[] = [];

	const rawConfig = {
		music: {
			rootPath: path.resolve(env.MUSIC_ROOT_PATH || "./music"),
			extensions: parseList(env.MUSIC_EXTENSIONS, ".mp3,.flac,.m4a,.ogg,.opus,.wav,.wma,.aac"),
			ignoreMarker: env.IGNORE_MARKER || ".ignore",
		},
		catalog: {
			url: (env.CATALOG_URL || "http://localhost").replace(/\/+$/, ""),
			port: readInt(env, "CATALOG_PORT", 5005, issues),
			oneTrackEndpoint: env.ONE_TRACK_ENDPOINT || "/add_track/",
			manyTracksEndpoint: env.MANY_TRACKS_ENDPOINT || "/add_tracks/",
			healthTimeoutMs: 5000,
		},
		scan: {
			batchSize: readInt(env, "BATCH_SIZE", 100, issues),
			scanTime: env.SCAN_TIME || "03:00",
			intervalMinutes: readOptionalInt(env, "SCAN_INTERVAL_MINUTES", issues),
			checkpointPolicy: env.CHECKPOINT_POLICY || "always",
		},
		statePath: env.STATE_PATH || defaultStatePath(env),
		logLevel: (env.LOG_LEVEL || "info").toLowerCase(),
	};

	const parsed = configSchema.safeParse(rawConfig);
	if (!parsed.success) {
		for (const issue of parsed.error.issues) {
			issues.push(`${issue.path.join(".")}: ${issue.message}`);
		}
	}
	if (issues.length > 0 || !parsed.success) {
		throw new ConfigError(issues);
	}

	return Object.freeze(parsed.data);
}

export function catalogBaseUrl(config: Config): string {
	return `${config.catalog.url}:${config.catalog.port}`;
}
