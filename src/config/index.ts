import { z } from 'zod';
import dotenv from 'dotenv';
import { ConfigError } from '../errors.js';

const configSchema = z.object({
  spotify: z.object({
    clientId: z.string(),
    clientSecret: z.string().optional(),
    redirectUri: z.string().url(),
    tokenCachePath: z.string().min(1),
  }),
  sync: z.object({
    historyDir: z.string().min(1),
    csvDownloadDir: z.string().min(1),
    errorLogPath: z.string().min(1),
  }),
  ytDlp: z.object({
    path: z.string().min(1),
    ffmpegPath: z.string().optional(),
    audioFormat: z.enum(['m4a', 'mp3', 'opus', 'flac', 'wav', 'aac', 'vorbis']),
    timeoutSeconds: z.number().int().min(0),
  }),
});

type Config = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

function loadConfig(env: Env = process.env): Config {
  if (env === process.env) {
    dotenv.config();
  }

  const rawConfig = {
    spotify: {
      clientId: env.SPOTIFY_CLIENT_ID?.trim() || '',
      clientSecret: env.SPOTIFY_CLIENT_SECRET?.trim() || undefined,
      redirectUri: env.SPOTIFY_REDIRECT_URI || 'http://127.0.0.1:8888/callback',
      tokenCachePath: env.SPOTIFY_TOKEN_CACHE || '.cache_spotify',
    },
    sync: {
      historyDir: env.HISTORY_DIR || 'playlists',
      csvDownloadDir: env.CSV_DOWNLOAD_DIR || 'downloads_csv',
      errorLogPath: env.ERROR_LOG_PATH || '.plsync/sync-errors.json',
    },
    ytDlp: {
      path: env.YT_DLP_PATH || 'yt-dlp',
      ffmpegPath: env.FFMPEG_PATH || undefined,
      audioFormat: (env.AUDIO_FORMAT || 'm4a').toLowerCase(),
      timeoutSeconds: parseInt(env.FETCH_TIMEOUT_SECONDS || '0', 10),
    },
  };

  const parsed = configSchema.safeParse(rawConfig);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

export { loadConfig };
export type { Config };
