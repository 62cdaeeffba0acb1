/**
 * Authenticated Spotify session
 *
 * A session is opened explicitly, handed to the sync run, and closed
 * explicitly; closing writes the latest tokens back to the cache file.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { AuthError, errorCode } from '../../errors.js';
import {
  exchangeCodeForTokens,
  generateOAuthState,
  generatePKCE,
  getAuthorizationUrl,
  parseAuthorizationResponse,
  type SpotifyAuthSettings,
  type SpotifyTokens,
} from './auth.js';
import { SpotifyClient, type SpotifyClientOptions } from './client.js';

const tokenCacheSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string(),
  expires_at: z.number(),
});

export interface SpotifySessionSettings extends SpotifyAuthSettings {
  tokenCachePath: string;
}

/** Shows the authorization URL and returns what the user pasted back */
export type AuthorizationPrompt = (authorizationUrl: string) => Promise<string>;

export function readTokenCache(cachePath: string): SpotifyTokens | null {
  let content: string;
  try {
    content = fs.readFileSync(cachePath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return null;
    throw error;
  }

  try {
    const parsed = tokenCacheSchema.safeParse(JSON.parse(content));
    return parsed.success ? parsed.data : null;
  } catch {
    // Unparseable cache: fall back to a fresh login
    return null;
  }
}

export function writeTokenCache(cachePath: string, tokens: SpotifyTokens): void {
  const dir = path.dirname(cachePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  fs.writeFileSync(cachePath, JSON.stringify(tokens, null, 2), { encoding: 'utf-8', mode: 0o600 });
}

/**
 * Run the PKCE authorization code flow and return fresh tokens
 */
export async function authorize(settings: SpotifyAuthSettings, prompt: AuthorizationPrompt): Promise<SpotifyTokens> {
  const state = generateOAuthState();
  const { codeVerifier, codeChallenge } = generatePKCE();
  const response = await prompt(getAuthorizationUrl(settings, state, codeChallenge));
  const code = parseAuthorizationResponse(response, state);
  return exchangeCodeForTokens(settings, code, codeVerifier);
}

export class SpotifySession {
  readonly client: SpotifyClient;
  private cachePath: string;
  private closed = false;

  constructor(tokens: SpotifyTokens, settings: SpotifySessionSettings, options: Omit<SpotifyClientOptions, 'onTokensRefreshed'> = {}) {
    this.cachePath = settings.tokenCachePath;
    this.client = new SpotifyClient(tokens, settings, {
      ...options,
      onTokensRefreshed: (refreshed) => writeTokenCache(this.cachePath, refreshed),
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    writeTokenCache(this.cachePath, this.client.currentTokens);
  }
}

/**
 * Open a session from the token cache, authorizing interactively when there
 * is no cached token
 */
export async function openSpotifySession(
  settings: SpotifySessionSettings,
  prompt: AuthorizationPrompt,
  options: Omit<SpotifyClientOptions, 'onTokensRefreshed'> = {}
): Promise<SpotifySession> {
  if (!settings.clientId) {
    throw new AuthError('SPOTIFY_CLIENT_ID is not set. Add it to your environment or .env file.');
  }

  let tokens = readTokenCache(settings.tokenCachePath);
  if (!tokens) {
    tokens = await authorize(settings, prompt);
    writeTokenCache(settings.tokenCachePath, tokens);
  }

  return new SpotifySession(tokens, settings, options);
}

/**
 * Scoped session: opened before `fn` runs and closed on every exit path
 */
export async function withSpotifySession<T>(
  settings: SpotifySessionSettings,
  prompt: AuthorizationPrompt,
  fn: (session: SpotifySession) => Promise<T>
): Promise<T> {
  const session = await openSpotifySession(settings, prompt);
  try {
    return await fn(session);
  } finally {
    await session.close();
  }
}
