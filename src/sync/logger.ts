import fs from "fs";
import path from "path";
import pc from "picocolors";
import type { DownloadSummary, TrackRef, TrackResult } from "./types.js";

export interface SyncSummary extends Omit<DownloadSummary, "results"> {
	catalogSize: number;
	newTracks: number;
	duration: number; // milliseconds
}

export interface FailureLogEntry {
	timestamp: string;
	playlistId: string;
	track: string;
	artist: string;
	error: string;
}

const MAX_FAILURE_LOG_ENTRIES = 1000;

/**
 * Load failure log from file
 */
export function loadFailureLog(logPath: string): FailureLogEntry[] {
	if (!fs.existsSync(logPath)) {
		return [];
	}

	try {
		const content: unknown = JSON.parse(fs.readFileSync(logPath, "utf-8"));
		return Array.isArray(content) ? content.filter(isFailureLogEntry) : [];
	} catch {
		return [];
	}
}

function isFailureLogEntry(value: unknown): value is FailureLogEntry {
	return (
		typeof value === "object" &&
		value !== null &&
		"track" in value &&
		typeof value.track === "string" &&
		"artist" in value &&
		typeof value.artist === "string"
	);
}

/**
 * Append failure entries to log
 */
export function writeFailureLog(logPath: string, entries: Array<Omit<FailureLogEntry, "timestamp">>): void {
	if (entries.length === 0) return;

	const dir = path.dirname(logPath);
	if (!fs.existsSync(dir)) {
		fs.mkdirSync(dir, { recursive: true });
	}

	const timestamp = new Date().toISOString();
	const existing = loadFailureLog(logPath);
	existing.push(...entries.map((entry) => ({ ...entry, timestamp })));

	// Keep only the most recent entries
	const trimmed = existing.slice(-MAX_FAILURE_LOG_ENTRIES);

	try {
		fs.writeFileSync(logPath, JSON.stringify(trimmed, null, 2), "utf-8");
	} catch (error) {
		console.error(pc.red(`Error writing failure log: ${error}`));
	}
}

/**
 * Log sync start
 */
export function logSyncStart(options: { playlistId: string; destination: string; dryRun: boolean }): void {
	console.log();
	console.log("═══════════════════════════════════════════════════════════");
	console.log("  Starting Playlist Sync");
	console.log("═══════════════════════════════════════════════════════════");
	console.log(`  Playlist:    ${options.playlistId}`);
	console.log(`  Destination: ${options.destination}`);
	console.log(`  Mode:        ${options.dryRun ? "Dry Run" : "Download"}`);
	console.log("═══════════════════════════════════════════════════════════");
	console.log();
}

export function logCatalog(catalogSize: number, newTracks: number): void {
	console.log(`  Found ${catalogSize} tracks in playlist, ${newTracks} not in history.`);
}

/**
 * List new tracks without downloading or recording anything
 */
export function reportDryRun(tracks: readonly TrackRef[]): void {
	console.log(pc.yellow(`  New tracks not in history (${tracks.length}):`));
	for (const track of tracks) {
		console.log(`    - ${track.artist} - ${track.name}`);
	}
}

export function logTrackStart(track: TrackRef, index: number, total: number): void {
	console.log(pc.dim(`  [${index}/${total}]`) + ` Downloading: ${track.artist} - ${track.name}`);
}

/**
 * Log download result for a track
 */
export function logTrackResult(result: TrackResult): void {
	const label = `${result.track.artist} - ${result.track.name}`;
	if (result.state === "recorded") {
		console.log(pc.green(`    ✓ Downloaded and recorded: ${label}`));
	} else {
		console.log(pc.red(`    ✗ Failed: ${label}`) + (result.error ? pc.dim(` (${result.error})`) : ""));
	}
}

/**
 * Log sync complete with summary
 */
export function logSyncComplete(summary: SyncSummary): void {
	const durationSeconds = (summary.duration / 1000).toFixed(1);

	console.log();
	console.log("═══════════════════════════════════════════════════════════");
	console.log("  Sync Complete");
	console.log("═══════════════════════════════════════════════════════════");
	console.log(`  Tracks in Playlist: ${summary.catalogSize}`);
	console.log(`  New Tracks: ${summary.newTracks}`);
	console.log(`  Tracks Processed: ${summary.processed}`);
	console.log(`  Tracks Downloaded: ${summary.succeeded}`);
	if (summary.failed > 0) {
		console.log(`  Tracks Failed: ${summary.failed}`);
	}
	console.log(`  Duration: ${durationSeconds}s`);
	console.log("═══════════════════════════════════════════════════════════");
	console.log();
}
