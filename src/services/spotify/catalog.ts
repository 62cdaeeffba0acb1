import type { CatalogFetcher, TrackRef } from '../../sync/types.js';
import type { SpotifyPlaylistItem } from './client.js';
import type { SpotifySession } from './session.js';

// Removed tracks come back with a null track; episodes and some local files have no artists
export function playlistItemToTrackRef(item: SpotifyPlaylistItem): TrackRef | null {
  const track = item.track;
  if (!track || !track.name || !track.artists || track.artists.length === 0) {
    return null;
  }
  return { name: track.name, artist: track.artists[0].name };
}

export class SpotifyCatalog implements CatalogFetcher<SpotifySession> {
  async fetchTracks(session: SpotifySession, playlistId: string): Promise<TrackRef[]> {
    const items = await session.client.getPlaylistItems(playlistId);
    return items.flatMap((item) => {
      const ref = playlistItemToTrackRef(item);
      return ref ? [ref] : [];
    });
  }
}
