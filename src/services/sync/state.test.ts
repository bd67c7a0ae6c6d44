import { describe, test, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";
import { ScanStateStore } from "./state.js";
import { RecordingLogger } from "../../test/recording-logger.js";

describe("Scan State Store", () => {
	const testRoot = path.join(os.tmpdir(), `catalog-sync-state-test-${Date.now()}`);
	const statePath = path.join(testRoot, "nested", "state.json");
	let logger: RecordingLogger;
	let store: ScanStateStore;

	beforeEach(() => {
		fs.rmSync(testRoot, { recursive: true, force: true });
		fs.mkdirSync(testRoot, { recursive: true });
		logger = new RecordingLogger();
		store = new ScanStateStore(statePath, logger);
	});

	afterEach(() => {
		fs.rmSync(testRoot, { recursive: true, force: true });
	});

	test("getLastScanTime returns 0 when no checkpoint exists", async () => {
		expect(await store.getLastScanTime()).toBe(0);
		expect(logger.messages("error")).toEqual([]);
	});

	test("saveLastScanTime creates the parent directory and round-trips", async () => {
		expect(await store.saveLastScanTime(1712345678.25)).toBe(true);

		expect(fs.existsSync(statePath)).toBe(true);
		expect(await store.getLastScanTime()).toBe(1712345678.25);
		expect(JSON.parse(fs.readFileSync(statePath, "utf-8"))).toEqual({ lastScanTime: 1712345678.25 });
	});

	test("saveLastScanTime never moves the checkpoint backwards", async () => {
		await store.saveLastScanTime(2000);
		await store.saveLastScanTime(1500);

		expect(await store.getLastScanTime()).toBe(2000);
	});

	test("corrupt checkpoint is logged and treated as no checkpoint", async () => {
		fs.mkdirSync(path.dirname(statePath), { recursive: true });
		fs.writeFileSync(statePath, "{ not json");

		expect(await store.getLastScanTime()).toBe(0);
		expect(logger.messages("error")).toHaveLength(1);
		expect(logger.messages("error")[0]).toContain("Error parsing state file");
	});

	test("checkpoint with the wrong shape is ignored", async () => {
		fs.mkdirSync(path.dirname(statePath), { recursive: true });
		fs.writeFileSync(statePath, JSON.stringify({ lastScanTime: "yesterday" }));

		expect(await store.getLastScanTime()).toBe(0);
		expect(logger.messages("error")).toEqual([`Ignoring malformed state file ${statePath}`]);
	});

	test("saveLastScanTime reports failure instead of throwing", async () => {
		// A regular file where the state directory should be makes mkdir fail.
		fs.writeFileSync(path.join(testRoot, "nested"), "blocker");

		expect(await store.saveLastScanTime(100)).toBe(false);
		expect(logger.messages("error").some((m) => m.startsWith("Error saving state file"))).toBe(true);
	});
});
