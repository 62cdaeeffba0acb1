import fs from "fs";
import { CsvFormatError } from "../errors.js";
import type { CatalogFetcher, TrackRef } from "./types.js";

export const TRACK_NAME_COLUMN = "Track Name";
export const ARTIST_NAME_COLUMN = "Artist Name(s)";

/**
 * Quote a value if it contains the delimiter, a quote or a line break
 */
export function escapeCsvValue(value: string): string {
	const needsQuoting = value.includes(",") || value.includes('"') || value.includes("\n") || value.includes("\r");
	return needsQuoting ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatCsvRow(values: string[]): string {
	return values.map(escapeCsvValue).join(",");
}

/**
 * Split CSV text into rows of fields. Handles quoted fields with embedded
 * delimiters, doubled quotes and line breaks; accepts LF and CRLF endings.
 */
export function parseCsv(content: string): string[][] {
	const rows: string[][] = [];
	let row: string[] = [];
	let field = "";
	let inQuotes = false;

	for (let i = 0; i < content.length; i++) {
		const ch = content[i];

		if (inQuotes) {
			if (ch === '"') {
				if (content[i + 1] === '"') {
					field += '"';
					i++;
				} else {
					inQuotes = false;
				}
			} else {
				field += ch;
			}
			continue;
		}

		if (ch === '"') {
			inQuotes = true;
		} else if (ch === ",") {
			row.push(field);
			field = "";
		} else if (ch === "\n" || ch === "\r") {
			if (ch === "\r" && content[i + 1] === "\n") i++;
			row.push(field);
			rows.push(row);
			row = [];
			field = "";
		} else {
			field += ch;
		}
	}

	if (field !== "" || row.length > 0) {
		row.push(field);
		rows.push(row);
	}

	return rows;
}

/**
 * Read tracks from a playlist export with a header row. Only the first of
 * several `;`-separated artists is kept; rows missing either value are skipped.
 */
export function readTracksFromCsv(filePath: string): TrackRef[] {
	const content = fs.readFileSync(filePath, "utf-8").replace(/^\uFEFF/, "");
	const [header, ...rows] = parseCsv(content);
	if (!header) {
		throw new CsvFormatError(`CSV file ${filePath} is empty`);
	}

	const nameIndex = header.indexOf(TRACK_NAME_COLUMN);
	const artistIndex = header.indexOf(ARTIST_NAME_COLUMN);
	if (nameIndex === -1 || artistIndex === -1) {
		throw new CsvFormatError(
			`CSV file must contain columns '${TRACK_NAME_COLUMN}' and '${ARTIST_NAME_COLUMN}'`
		);
	}

	const tracks: TrackRef[] = [];
	for (const row of rows) {
		const name = row[nameIndex];
		const artists = row[artistIndex];
		if (!name || !artists) continue;

		tracks.push({
			name: name.trim(),
			artist: artists.split(";")[0].trim(),
		});
	}
	return tracks;
}

/**
 * Catalog backed by a playlist export file; the "session" is the file path
 */
export class CsvCatalog implements CatalogFetcher<string> {
	async fetchTracks(csvPath: string): Promise<TrackRef[]> {
		return readTracksFromCsv(csvPath);
	}
}
