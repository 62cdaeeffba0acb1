import { FetcherUnavailableError, errorMessage } from "../errors.js";
import type { DownloadSummary, HistoryStore, TrackFetcher, TrackRef, TrackResult } from "./types.js";

export interface OrchestratorOptions {
	playlistId: string;
	destination: string;
	fetcher: TrackFetcher;
	history: HistoryStore;
	onTrackStart?: (track: TrackRef, index: number, total: number) => void;
	onTrackComplete?: (result: TrackResult, index: number, total: number) => void;
}

/**
 * Download tracks one at a time, recording each success in history as soon
 * as it happens. A failed track is reported and skipped; it stays out of
 * history and is picked up again on the next run.
 */
export async function downloadTracks(tracks: TrackRef[], options: OrchestratorOptions): Promise<DownloadSummary> {
	const { playlistId, destination, fetcher, history } = options;
	const results: TrackResult[] = [];
	const total = tracks.length;

	for (let i = 0; i < total; i++) {
		const track = tracks[i];
		options.onTrackStart?.(track, i + 1, total);

		const result = await downloadTrack(track, playlistId, destination, fetcher, history);
		results.push(result);

		options.onTrackComplete?.(result, i + 1, total);
	}

	const succeeded = results.filter((r) => r.state === "recorded").length;
	return {
		processed: results.length,
		succeeded,
		failed: results.length - succeeded,
		results,
	};
}

async function downloadTrack(
	track: TrackRef,
	playlistId: string,
	destination: string,
	fetcher: TrackFetcher,
	history: HistoryStore
): Promise<TrackResult> {
	let filePath: string | undefined;
	try {
		const outcome = await fetcher.fetch({ track: track.name, artist: track.artist, destination });
		if (!outcome.success) {
			return { track, state: "failed", error: outcome.error };
		}
		filePath = outcome.filePath;
	} catch (error) {
		if (error instanceof FetcherUnavailableError) throw error;
		return { track, state: "failed", error: errorMessage(error) };
	}

	try {
		await history.append(playlistId, track.name, track.artist);
	} catch (error) {
		return { track, state: "failed", filePath, error: `Downloaded but not recorded: ${errorMessage(error)}` };
	}

	return { track, state: "recorded", filePath };
}
