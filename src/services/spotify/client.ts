import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { CatalogError } from '../../errors.js';
import { refreshAccessToken, type SpotifyAuthSettings, type SpotifyTokens } from './auth.js';

export interface SpotifyTrack {
  id: string | null;
  name: string;
  type?: 'track' | 'episode';
  artists?: Array<{ id: string | null; name: string }>;
}

export interface SpotifyPlaylistItem {
  added_at?: string;
  is_local?: boolean;
  track: SpotifyTrack | null;
}

export interface SpotifyPaging<T> {
  items: T[];
  next: string | null;
  offset: number;
  limit: number;
  total: number;
}

export interface SpotifyClientOptions {
  /** Called with the new tokens after every refresh */
  onTokensRefreshed?: (tokens: SpotifyTokens) => void;
  /** Request adapter override, used by tests */
  adapter?: AxiosAdapter;
}

const PAGE_SIZE = 100;

export class SpotifyClient {
  private client: AxiosInstance;
  private tokens: SpotifyTokens;

  constructor(tokens: SpotifyTokens, auth: SpotifyAuthSettings, options: SpotifyClientOptions = {}) {
    this.tokens = tokens;

    this.client = axios.create({
      baseURL: 'https://api.spotify.com/v1',
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });

    // Refresh the access token shortly before it expires
    this.client.interceptors.request.use(async (config) => {
      if (Date.now() >= this.tokens.expires_at - 60000) {
        this.tokens = await refreshAccessToken(auth, this.tokens.refresh_token);
        options.onTokensRefreshed?.(this.tokens);
      }
      config.headers.Authorization = `Bearer ${this.tokens.access_token}`;
      return config;
    });
  }

  get currentTokens(): SpotifyTokens {
    return this.tokens;
  }

  // Get one page of playlist items
  async getPlaylistItemsPage(playlistId: string, offset: number = 0): Promise<SpotifyPaging<SpotifyPlaylistItem>> {
    return this.get<SpotifyPaging<SpotifyPlaylistItem>>(`/playlists/${encodeURIComponent(playlistId)}/tracks`, {
      offset,
      limit: PAGE_SIZE,
    });
  }

  // Get every playlist item, following `next` until the last page
  async getPlaylistItems(playlistId: string): Promise<SpotifyPlaylistItem[]> {
    let page = await this.getPlaylistItemsPage(playlistId);
    const items = [...page.items];

    while (page.next) {
      page = await this.get<SpotifyPaging<SpotifyPlaylistItem>>(page.next);
      items.push(...page.items);
    }

    return items;
  }

  private async get<T>(url: string, params?: Record<string, string | number>): Promise<T> {
    try {
      const response = await this.client.get<T>(url, { params });
      return response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        const message = error.response?.data?.error?.message || error.message;
        throw new CatalogError(`Spotify request failed${status ? ` (${status})` : ''}: ${message}`, status);
      }
      throw error;
    }
  }
}
