import pc from "picocolors";
import { loadConfig } from "../config/index.js";
import { YtDlpFetcher } from "../downloader/index.js";
import { SpotifyCatalog, withSpotifySession } from "../services/spotify/index.js";
import { CsvHistoryStore } from "../sync/history.js";
import { syncPlaylist } from "../sync/sync.js";
import { promptForAuthorization } from "./prompt.js";

export interface SyncCommandOptions {
	dryRun?: boolean;
	historyDir?: string;
}

/**
 * Sync a Spotify playlist into a folder. Resolves to the process exit code.
 */
export async function syncCommand(reference: string, destination: string, opts: SyncCommandOptions): Promise<number> {
	const config = loadConfig();
	const history = new CsvHistoryStore(opts.historyDir || config.sync.historyDir);
	const fetcher = new YtDlpFetcher({
		binaryPath: config.ytDlp.path,
		audioFormat: config.ytDlp.audioFormat,
		ffmpegPath: config.ytDlp.ffmpegPath,
		timeoutMs: config.ytDlp.timeoutSeconds * 1000,
	});

	if (config.ytDlp.ffmpegPath) {
		console.log(pc.dim(`  Using explicit FFmpeg location: ${config.ytDlp.ffmpegPath}`));
	}

	const result = await withSpotifySession(config.spotify, promptForAuthorization, (session) =>
		syncPlaylist({
			reference,
			destination,
			session,
			catalog: new SpotifyCatalog(),
			history,
			fetcher,
			dryRun: opts.dryRun === true,
			failureLogPath: config.sync.errorLogPath,
		})
	);

	if (result.dryRun) {
		return 0;
	}

	if (result.summary.newTracks === 0) {
		console.log(pc.green("  ✓ Playlist already in sync!"));
		console.log();
	} else if (result.summary.failed > 0) {
		console.log(pc.dim(`  Failures were written to ${config.sync.errorLogPath}; they will be retried next run.`));
		console.log();
	}

	return result.summary.failed > 0 ? 1 : 0;
}
