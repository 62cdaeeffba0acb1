import type { NormalizedKey, TrackRef } from "./types.js";

const KEY_SEPARATOR = "\u0000";

export function normalizeTrackKey(track: string, artist: string): NormalizedKey {
	return `${track.trim().toLowerCase()}${KEY_SEPARATOR}${artist.trim().toLowerCase()}`;
}

/**
 * Tracks from the catalog that are not in history, in catalog order.
 */
export function diffTracks(catalog: readonly TrackRef[], history: ReadonlySet<NormalizedKey>): TrackRef[] {
	return catalog.filter((ref) => !history.has(normalizeTrackKey(ref.name, ref.artist)));
}
