import { describe, test, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import os from "os";
import { CsvFormatError } from "../errors.js";
import { escapeCsvValue, formatCsvRow, parseCsv, readTracksFromCsv } from "./csv.js";

describe("CSV", () => {
	const testRoot = path.join(os.tmpdir(), `plsync-csv-test-${process.pid}-${Date.now()}`);

	beforeEach(() => {
		fs.mkdirSync(testRoot, { recursive: true });
	});

	afterEach(() => {
		fs.rmSync(testRoot, { recursive: true, force: true });
	});

	test("escapeCsvValue leaves plain values alone", () => {
		expect(escapeCsvValue("Song A")).toBe("Song A");
	});

	test("escapeCsvValue quotes delimiters and doubles quotes", () => {
		expect(escapeCsvValue("Hello, World")).toBe('"Hello, World"');
		expect(escapeCsvValue('The "Best" Song')).toBe('"The ""Best"" Song"');
	});

	test("formatCsvRow joins escaped fields", () => {
		expect(formatCsvRow(["Yes, Sir", "Artist"])).toBe('"Yes, Sir",Artist');
	});

	test("parseCsv reads quoted fields and mixed line endings", () => {
		const content = 'a,b\r\n"c, d","e ""f"""\n"multi\nline",g\n';
		expect(parseCsv(content)).toEqual([
			["a", "b"],
			["c, d", 'e "f"'],
			["multi\nline", "g"],
		]);
	});

	test("parseCsv handles a last line without newline", () => {
		expect(parseCsv("x,y\nz,w")).toEqual([
			["x", "y"],
			["z", "w"],
		]);
	});

	test("parseCsv returns a single empty field for a blank line", () => {
		expect(parseCsv("a,b\n\nc,d\n")).toEqual([["a", "b"], [""], ["c", "d"]]);
	});

	test("parseCsv reads back what formatCsvRow wrote", () => {
		const row = ['Comma, "Quote"', "Plain"];
		expect(parseCsv(`${formatCsvRow(row)}\n`)).toEqual([row]);
	});

	test("readTracksFromCsv keeps first artist and trims values", () => {
		const file = path.join(testRoot, "export.csv");
		fs.writeFileSync(
			file,
			[
				"Track URI,Track Name,Artist Name(s),Album Name",
				'spotify:track:1, Song One ,"Artist A;Artist B",Album',
				"spotify:track:2,Song Two,Artist C,Album",
				"spotify:track:3,,Artist D,Album",
				"spotify:track:4,Song Four,,Album",
			].join("\n"),
			"utf-8"
		);

		expect(readTracksFromCsv(file)).toEqual([
			{ name: "Song One", artist: "Artist A" },
			{ name: "Song Two", artist: "Artist C" },
		]);
	});

	test("readTracksFromCsv ignores a byte order mark", () => {
		const file = path.join(testRoot, "bom.csv");
		fs.writeFileSync(file, "\uFEFFTrack Name,Artist Name(s)\nSong,Artist\n", "utf-8");

		expect(readTracksFromCsv(file)).toEqual([{ name: "Song", artist: "Artist" }]);
	});

	test("readTracksFromCsv rejects files without the expected columns", () => {
		const file = path.join(testRoot, "bad.csv");
		fs.writeFileSync(file, "Title,Artist\nSong,Artist\n", "utf-8");

		expect(() => readTracksFromCsv(file)).toThrow(CsvFormatError);
	});
});
