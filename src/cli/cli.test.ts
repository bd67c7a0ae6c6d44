import { describe, test, expect } from "vitest";
import { loadConfig } from "../config/index.js";
import { describeSchedule, scheduleFromConfig } from "./run.js";
import { reportedPath } from "./send.js";

describe("run command", () => {
	test("uses the daily scan time unless an interval is set", () => {
		const daily = scheduleFromConfig(loadConfig({ SCAN_TIME: "04:15" }));
		const interval = scheduleFromConfig(loadConfig({ SCAN_TIME: "04:15", SCAN_INTERVAL_MINUTES: "10" }));

		expect(daily).toEqual({ kind: "daily", time: "04:15" });
		expect(interval).toEqual({ kind: "interval", minutes: 10 });
	});

	test("describeSchedule", () => {
		expect(describeSchedule({ kind: "daily", time: "03:00" })).toBe("daily at 03:00");
		expect(describeSchedule({ kind: "interval", minutes: 5 })).toBe("every 5 min");
	});
});

describe("send command", () => {
	test("reports library files relative to the root", () => {
		expect(reportedPath("/music", "/music/Artist/Album/01.mp3")).toBe("Artist/Album/01.mp3");
	});

	test("reports files outside the library by name", () => {
		expect(reportedPath("/music", "/downloads/new.flac")).toBe("new.flac");
	});
});
