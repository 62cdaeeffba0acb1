/**
 * Per-playlist download history
 * One CSV file per playlist ID, one raw `track,artist` record per line
 */

import fs from "fs/promises";
import path from "path";
import { HistoryReadError, errorCode } from "../errors.js";
import { formatCsvRow, parseCsv } from "./csv.js";
import { normalizeTrackKey } from "./diff.js";
import type { HistoryStore, NormalizedKey } from "./types.js";

export class CsvHistoryStore implements HistoryStore {
	readonly directory: string;

	constructor(directory: string) {
		this.directory = directory;
	}

	historyPath(playlistId: string): string {
		return path.join(this.directory, `${playlistId}.csv`);
	}

	/**
	 * Load previously downloaded tracks as normalized keys.
	 * A missing file means nothing was downloaded yet; any other read failure throws.
	 */
	async load(playlistId: string): Promise<Set<NormalizedKey>> {
		const historyPath = this.historyPath(playlistId);

		let content: string;
		try {
			content = await fs.readFile(historyPath, "utf-8");
		} catch (error) {
			if (errorCode(error) === "ENOENT") {
				return new Set();
			}
			throw new HistoryReadError(historyPath, error);
		}

		const downloaded = new Set<NormalizedKey>();
		for (const row of parseCsv(content)) {
			if (row.length >= 2) {
				downloaded.add(normalizeTrackKey(row[0], row[1]));
			}
		}
		return downloaded;
	}

	/**
	 * Append one record. Each call opens, writes and closes the file on its own,
	 * so a resolved append is on disk before the next track starts.
	 */
	async append(playlistId: string, track: string, artist: string): Promise<void> {
		await fs.mkdir(this.directory, { recursive: true });
		await fs.appendFile(this.historyPath(playlistId), `${formatCsvRow([track, artist])}\n`, "utf-8");
	}
}

/**
 * History kept in memory only, for runs whose history is thrown away afterwards
 */
export class MemoryHistoryStore implements HistoryStore {
	private records = new Map<string, Array<[string, string]>>();

	async load(playlistId: string): Promise<Set<NormalizedKey>> {
		const records = this.records.get(playlistId) ?? [];
		return new Set(records.map(([track, artist]) => normalizeTrackKey(track, artist)));
	}

	async append(playlistId: string, track: string, artist: string): Promise<void> {
		const records = this.records.get(playlistId) ?? [];
		records.push([track, artist]);
		this.records.set(playlistId, records);
	}

	entries(playlistId: string): Array<[string, string]> {
		return [...(this.records.get(playlistId) ?? [])];
	}
}
