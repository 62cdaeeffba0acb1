import { describe, test, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { loadFailureLog, writeFailureLog } from "./logger.js";

describe("failure log", () => {
	let logPath: string;

	beforeEach(() => {
		logPath = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "plsync-log-")), "nested", "errors.json");
	});

	afterEach(() => {
		fs.rmSync(path.dirname(path.dirname(logPath)), { recursive: true, force: true });
	});

	test("missing log loads as empty", () => {
		expect(loadFailureLog(logPath)).toEqual([]);
	});

	test("corrupt log loads as empty", () => {
		fs.mkdirSync(path.dirname(logPath), { recursive: true });
		fs.writeFileSync(logPath, "not json");
		expect(loadFailureLog(logPath)).toEqual([]);
	});

	test("appends entries with a timestamp", () => {
		writeFailureLog(logPath, [{ playlistId: "p1", track: "Song A", artist: "Artist", error: "boom" }]);
		writeFailureLog(logPath, [{ playlistId: "p1", track: "Song B", artist: "Artist", error: "bang" }]);

		const entries = loadFailureLog(logPath);
		expect(entries.map((e) => e.track)).toEqual(["Song A", "Song B"]);
		expect(Number.isNaN(Date.parse(entries[0].timestamp))).toBe(false);
	});

	test("writes nothing when there are no failures", () => {
		writeFailureLog(logPath, []);
		expect(fs.existsSync(logPath)).toBe(false);
	});

	test("keeps only the most recent 1000 entries", () => {
		const entries = Array.from({ length: 1005 }, (_, i) => ({
			playlistId: "p1",
			track: `Song ${i}`,
			artist: "Artist",
			error: "boom",
		}));

		writeFailureLog(logPath, entries);

		const kept = loadFailureLog(logPath);
		expect(kept).toHaveLength(1000);
		expect(kept[0].track).toBe("Song 5");
		expect(kept[999].track).toBe("Song 1004");
	});
});
