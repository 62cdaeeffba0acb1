import { describe, test, expect } from 'vitest';
import { ConfigError } from '../errors.js';
import { loadConfig } from './index.js';

describe('Config', () => {
  test('loadConfig applies defaults', () => {
    const config = loadConfig({});

    expect(config.spotify.clientId).toBe('');
    expect(config.spotify.clientSecret).toBeUndefined();
    expect(config.spotify.redirectUri).toBe('http://127.0.0.1:8888/callback');
    expect(config.spotify.tokenCachePath).toBe('.cache_spotify');
    expect(config.sync.historyDir).toBe('playlists');
    expect(config.sync.csvDownloadDir).toBe('downloads_csv');
    expect(config.sync.errorLogPath).toBe('.plsync/sync-errors.json');
    expect(config.ytDlp.path).toBe('yt-dlp');
    expect(config.ytDlp.ffmpegPath).toBeUndefined();
    expect(config.ytDlp.audioFormat).toBe('m4a');
    expect(config.ytDlp.timeoutSeconds).toBe(0);
  });

  test('loadConfig reads values from env', () => {
    const config = loadConfig({
      SPOTIFY_CLIENT_ID: '  test-client-id  ',
      SPOTIFY_CLIENT_SECRET: 'test-secret',
      SPOTIFY_REDIRECT_URI: 'http://localhost:9000/callback',
      HISTORY_DIR: '/data/history',
      YT_DLP_PATH: '/opt/yt-dlp',
      FFMPEG_PATH: '/usr/local/bin/ffmpeg',
      AUDIO_FORMAT: 'MP3',
      FETCH_TIMEOUT_SECONDS: '300',
    });

    expect(config.spotify.clientId).toBe('test-client-id');
    expect(config.spotify.clientSecret).toBe('test-secret');
    expect(config.spotify.redirectUri).toBe('http://localhost:9000/callback');
    expect(config.sync.historyDir).toBe('/data/history');
    expect(config.ytDlp.path).toBe('/opt/yt-dlp');
    expect(config.ytDlp.ffmpegPath).toBe('/usr/local/bin/ffmpeg');
    expect(config.ytDlp.audioFormat).toBe('mp3');
    expect(config.ytDlp.timeoutSeconds).toBe(300);
  });

  test('loadConfig rejects an invalid redirect URI', () => {
    expect(() => loadConfig({ SPOTIFY_REDIRECT_URI: 'not a url' })).toThrow(ConfigError);
  });

  test('loadConfig rejects an unknown audio format', () => {
    expect(() => loadConfig({ AUDIO_FORMAT: 'wma' })).toThrow(/ytDlp\.audioFormat/);
  });

  test('loadConfig rejects a non-numeric timeout', () => {
    expect(() => loadConfig({ FETCH_TIMEOUT_SECONDS: 'soon' })).toThrow(ConfigError);
  });
});
