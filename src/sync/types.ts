/** A track as listed by the catalog; `artist` is the primary (first) artist */
export interface TrackRef {
	name: string;
	artist: string;
}

/** Case- and whitespace-insensitive identity of a track, for membership checks only */
export type NormalizedKey = string;

export interface CatalogFetcher<S> {
	/** Full playlist listing in playlist order, every page included */
	fetchTracks(session: S, playlistId: string): Promise<TrackRef[]>;
}

export interface HistoryStore {
	load(playlistId: string): Promise<Set<NormalizedKey>>;
	append(playlistId: string, track: string, artist: string): Promise<void>;
}

export interface FetchRequest {
	track: string;
	artist: string;
	destination: string;
}

export type FetchOutcome = { success: true; filePath?: string } | { success: false; error: string };

/**
 * Retrieves the audio for one track. Resolves with a failure outcome when the
 * track cannot be found or retrieved; rejects with FetcherUnavailableError only
 * when the mechanism itself cannot run.
 */
export interface TrackFetcher {
	fetch(request: FetchRequest): Promise<FetchOutcome>;
}

export type TrackState = "pending" | "attempting" | "recorded" | "failed";

export interface TrackResult {
	track: TrackRef;
	state: Extract<TrackState, "recorded" | "failed">;
	filePath?: string;
	error?: string;
}

export interface DownloadSummary {
	processed: number;
	succeeded: number;
	failed: number;
	results: TrackResult[];
}
