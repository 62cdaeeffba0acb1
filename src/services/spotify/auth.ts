import axios from 'axios';
import { randomBytes, createHash } from 'crypto';
import { AuthError } from '../../errors.js';

export const SPOTIFY_SCOPES = 'playlist-read-private playlist-read-collaborative';

export interface SpotifyAuthSettings {
  clientId: string;
  clientSecret?: string;
  redirectUri: string;
}

export interface SpotifyTokens {
  access_token: string;
  refresh_token: string;
  expires_at: number;
}

// Generate state for OAuth flow
export function generateOAuthState(): string {
  return randomBytes(32).toString('hex');
}

// Generate code verifier and challenge for PKCE
export function generatePKCE(): { codeVerifier: string; codeChallenge: string } {
  const codeVerifier = randomBytes(32).toString('base64url');
  const codeChallenge = createHash('sha256')
    .update(codeVerifier)
    .digest('base64url');

  return { codeVerifier, codeChallenge };
}

// Get Spotify OAuth authorization URL
export function getAuthorizationUrl(settings: SpotifyAuthSettings, state: string, codeChallenge?: string): string {
  const params = new URLSearchParams({
    client_id: settings.clientId,
    response_type: 'code',
    redirect_uri: settings.redirectUri,
    scope: SPOTIFY_SCOPES,
    state,
  });

  if (codeChallenge) {
    params.append('code_challenge', codeChallenge);
    params.append('code_challenge_method', 'S256');
  }

  return `https://accounts.spotify.com/authorize?${params.toString()}`;
}

/**
 * Pull the authorization code out of the URL the browser was redirected to.
 * A bare code is accepted as well.
 */
export function parseAuthorizationResponse(input: string, expectedState: string): string {
  const trimmed = input.trim();
  if (!trimmed.includes('?')) {
    if (!trimmed) throw new AuthError('No authorization code provided');
    return trimmed;
  }

  const params = new URL(trimmed).searchParams;
  const error = params.get('error');
  if (error) {
    throw new AuthError(`Spotify authorization failed: ${error}`);
  }
  const state = params.get('state');
  if (state && state !== expectedState) {
    throw new AuthError('Spotify authorization failed: state mismatch');
  }
  const code = params.get('code');
  if (!code) {
    throw new AuthError('No authorization code found in redirect URL');
  }
  return code;
}

async function requestTokens(settings: SpotifyAuthSettings, data: URLSearchParams, action: string): Promise<{
  access_token: string;
  refresh_token?: string;
  expires_in?: number;
}> {
  if (settings.clientSecret) {
    data.append('client_secret', settings.clientSecret);
  }

  try {
    const response = await axios.post(
      'https://accounts.spotify.com/api/token',
      data,
      {
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
        },
      }
    );
    return response.data;
  } catch (error) {
    if (axios.isAxiosError(error)) {
      throw new AuthError(`Spotify token ${action} failed: ${error.response?.data?.error_description || error.message}`);
    }
    throw error;
  }
}

// Exchange authorization code for tokens
export async function exchangeCodeForTokens(
  settings: SpotifyAuthSettings,
  code: string,
  codeVerifier?: string
): Promise<SpotifyTokens> {
  const data = new URLSearchParams({
    grant_type: 'authorization_code',
    code,
    redirect_uri: settings.redirectUri,
    client_id: settings.clientId,
  });

  if (codeVerifier) {
    data.append('code_verifier', codeVerifier);
  }

  const tokens = await requestTokens(settings, data, 'exchange');
  const expiresIn = tokens.expires_in || 3600;

  return {
    access_token: tokens.access_token,
    refresh_token: tokens.refresh_token || '',
    expires_at: Date.now() + expiresIn * 1000,
  };
}

// Refresh access token
export async function refreshAccessToken(settings: SpotifyAuthSettings, refreshToken: string): Promise<SpotifyTokens> {
  if (!refreshToken) {
    throw new AuthError('Spotify session expired and no refresh token is available. Run `plsync login`.');
  }

  const data = new URLSearchParams({
    grant_type: 'refresh_token',
    refresh_token: refreshToken,
    client_id: settings.clientId,
  });

  const tokens = await requestTokens(settings, data, 'refresh');
  const expiresIn = tokens.expires_in || 3600;

  return {
    access_token: tokens.access_token,
    refresh_token: tokens.refresh_token || refreshToken,
    expires_at: Date.now() + expiresIn * 1000,
  };
}
