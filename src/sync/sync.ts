import { PlaylistSyncError } from "../errors.js";
import { diffTracks } from "./diff.js";
import {
	logCatalog,
	logSyncComplete,
	logSyncStart,
	logTrackResult,
	logTrackStart,
	reportDryRun,
	writeFailureLog,
	type SyncSummary,
} from "./logger.js";
import { downloadTracks } from "./orchestrator.js";
import { resolvePlaylistId } from "./resolver.js";
import type { CatalogFetcher, HistoryStore, TrackFetcher, TrackRef, TrackResult } from "./types.js";

export interface SyncOptions<S> {
	/** Playlist URL, URI or bare ID */
	reference: string;
	destination: string;
	session: S;
	catalog: CatalogFetcher<S>;
	history: HistoryStore;
	/** Required unless `dryRun` is set */
	fetcher?: TrackFetcher;
	/** List new tracks only: no fetching, no history writes */
	dryRun?: boolean;
	failureLogPath?: string;
	quiet?: boolean;
	onTrackStart?: (track: TrackRef, index: number, total: number) => void;
	onTrackComplete?: (result: TrackResult, index: number, total: number) => void;
}

export interface SyncResult {
	playlistId: string;
	dryRun: boolean;
	newTracks: TrackRef[];
	results: TrackResult[];
	summary: SyncSummary;
}

/**
 * Sync one playlist: list it, compare against history, and download what is missing.
 * Catalog and history-load failures propagate before anything is written.
 */
export async function syncPlaylist<S>(options: SyncOptions<S>): Promise<SyncResult> {
	const startTime = Date.now();
	const { reference, destination, session, catalog, history, fetcher, failureLogPath, dryRun = false, quiet = false } = options;
	if (!dryRun && !fetcher) {
		throw new PlaylistSyncError("A track fetcher is required unless running a dry run");
	}

	const playlistId = resolvePlaylistId(reference);
	if (!quiet) {
		logSyncStart({ playlistId, destination, dryRun });
	}

	const tracks = await catalog.fetchTracks(session, playlistId);
	const downloaded = await history.load(playlistId);
	const newTracks = diffTracks(tracks, downloaded);

	if (!quiet) {
		logCatalog(tracks.length, newTracks.length);
	}

	if (dryRun || !fetcher) {
		if (!quiet) reportDryRun(newTracks);
		return {
			playlistId,
			dryRun: true,
			newTracks,
			results: [],
			summary: {
				catalogSize: tracks.length,
				newTracks: newTracks.length,
				processed: 0,
				succeeded: 0,
				failed: 0,
				duration: Date.now() - startTime,
			},
		};
	}

	const { results, ...counts } = await downloadTracks(newTracks, {
		playlistId,
		destination,
		fetcher,
		history,
		onTrackStart: (track, index, total) => {
			if (!quiet) logTrackStart(track, index, total);
			options.onTrackStart?.(track, index, total);
		},
		onTrackComplete: (result, index, total) => {
			if (!quiet) logTrackResult(result);
			// Per track, so failures before an abort are kept
			if (result.state === "failed" && failureLogPath) {
				writeFailureLog(failureLogPath, [
					{
						playlistId,
						track: result.track.name,
						artist: result.track.artist,
						error: result.error ?? "Unknown error",
					},
				]);
			}
			options.onTrackComplete?.(result, index, total);
		},
	});

	const summary: SyncSummary = {
		catalogSize: tracks.length,
		newTracks: newTracks.length,
		...counts,
		duration: Date.now() - startTime,
	};

	if (!quiet) {
		logSyncComplete(summary);
	}

	return { playlistId, dryRun: false, newTracks, results, summary };
}
