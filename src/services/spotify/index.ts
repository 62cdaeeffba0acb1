export {
  generateOAuthState,
  generatePKCE,
  getAuthorizationUrl,
  parseAuthorizationResponse,
  exchangeCodeForTokens,
  refreshAccessToken,
  SPOTIFY_SCOPES,
  type SpotifyAuthSettings,
  type SpotifyTokens,
} from './auth.js';

export {
  SpotifyClient,
  type SpotifyClientOptions,
  type SpotifyPaging,
  type SpotifyPlaylistItem,
  type SpotifyTrack,
} from './client.js';

export {
  SpotifySession,
  authorize,
  openSpotifySession,
  readTokenCache,
  withSpotifySession,
  writeTokenCache,
  type AuthorizationPrompt,
  type SpotifySessionSettings,
} from './session.js';

export { SpotifyCatalog, playlistItemToTrackRef } from './catalog.js';
