import { describe, test, expect } from "vitest";
import path from "path";
import {
	ConfigError,
	catalogBaseUrl,
	defaultStatePath,
	loadConfig,
	normalizeExtension,
} from "./index.js";

describe("Config", () => {
	test("loadConfig applies defaults when env is empty", () => {
		const config = loadConfig({ XDG_STATE_HOME: "/tmp/state" });

		expect(config.music.rootPath).toBe(path.resolve("./music"));
		expect(config.music.ignoreMarker).toBe(".ignore");
		expect(config.music.extensions).toContain(".mp3");
		expect(config.scan.batchSize).toBe(100);
		expect(config.scan.scanTime).toBe("03:00");
		expect(config.scan.intervalMinutes).toBeUndefined();
		expect(config.scan.checkpointPolicy).toBe("always");
		expect(config.catalog.healthTimeoutMs).toBe(5000);
		expect(config.statePath).toBe(path.join("/tmp/state", "catalog-sync", "state.json"));
		expect(config.logLevel).toBe("info");
	});

	test("loadConfig reads library and catalog settings from env", () => {
		const config = loadConfig({
			MUSIC_ROOT_PATH: "/test/music/path",
			MUSIC_EXTENSIONS: "MP3, flac,.Ogg",
			CATALOG_URL: "http://catalog.lan/",
			CATALOG_PORT: "6000",
			MANY_TRACKS_ENDPOINT: "/tracks/batch/",
			BATCH_SIZE: "25",
			SCAN_INTERVAL_MINUTES: "30",
			CHECKPOINT_POLICY: "all-delivered",
			LOG_LEVEL: "DEBUG",
		});

		expect(config.music.rootPath).toBe("/test/music/path");
		expect(config.music.extensions).toEqual([".mp3", ".flac", ".ogg"]);
		expect(catalogBaseUrl(config)).toBe("http://catalog.lan:6000");
		expect(config.catalog.manyTracksEndpoint).toBe("/tracks/batch/");
		expect(config.catalog.oneTrackEndpoint).toBe("/add_track/");
		expect(config.scan.batchSize).toBe(25);
		expect(config.scan.intervalMinutes).toBe(30);
		expect(config.scan.checkpointPolicy).toBe("all-delivered");
		expect(config.logLevel).toBe("debug");
	});

	test("loadConfig rejects invalid values with every issue listed", () => {
		let caught: unknown;
		try {
			loadConfig({ BATCH_SIZE: "lots", SCAN_TIME: "25:00", CHECKPOINT_POLICY: "sometimes" });
		} catch (e) {
			caught = e;
		}

		expect(caught).toBeInstanceOf(ConfigError);
		const issues = caught instanceof ConfigError ? caught.issues : [];
		expect(issues).toContain('BATCH_SIZE: expected an integer, got "lots"');
		expect(issues).toContain("scan.scanTime: must be HH:MM");
		expect(issues.some((issue) => issue.startsWith("scan.checkpointPolicy:"))).toBe(true);
	});

	test("a non-numeric scan interval is reported once", () => {
		let caught: unknown;
		try {
			loadConfig({ SCAN_INTERVAL_MINUTES: "abc" });
		} catch (e) {
			caught = e;
		}

		expect(caught).toBeInstanceOf(ConfigError);
		expect(caught instanceof ConfigError ? caught.issues : []).toEqual([
			'SCAN_INTERVAL_MINUTES: expected an integer, got "abc"',
		]);
	});

	test("loadConfig rejects a zero batch size", () => {
		expect(() => loadConfig({ BATCH_SIZE: "0" })).toThrow(ConfigError);
	});

	test("loadConfig returns a frozen object", () => {
		const config = loadConfig({});
		expect(Object.isFrozen(config)).toBe(true);
	});

	test("normalizeExtension adds the dot and lowercases", () => {
		expect(normalizeExtension("MP3")).toBe(".mp3");
		expect(normalizeExtension(" .Flac ")).toBe(".flac");
	});

	test("defaultStatePath falls back to ~/.local/state", () => {
		expect(defaultStatePath({})).toMatch(/\.local[\\/]state[\\/]catalog-sync[\\/]state\.json$/);
	});
});
