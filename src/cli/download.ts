import path from "path";
import pc from "picocolors";
import cliProgress from "cli-progress";
import { loadConfig } from "../config/index.js";
import { YtDlpFetcher } from "../downloader/index.js";
import { CsvCatalog } from "../sync/csv.js";
import { MemoryHistoryStore } from "../sync/history.js";
import { reportDryRun } from "../sync/logger.js";
import { syncPlaylist } from "../sync/sync.js";
import type { TrackResult } from "../sync/types.js";

export interface DownloadCommandOptions {
	dryRun?: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

function printHeader() {
	console.log();
	console.log(pc.bold(pc.magenta("  ╭─────────────────────────────────╮")));
	console.log(pc.bold(pc.magenta("  │")) + pc.bold(pc.white("    🎵 plsync • CSV Downloader    ")) + pc.bold(pc.magenta("│")));
	console.log(pc.bold(pc.magenta("  ╰─────────────────────────────────╯")));
	console.log();
}

function printConfig(csvPath: string, destination: string) {
	console.log(pc.dim("  ┌─ Config ─────────────────────────────────"));
	console.log(pc.dim("  │ ") + pc.cyan("CSV file:    ") + pc.white(csvPath));
	console.log(pc.dim("  │ ") + pc.cyan("Destination: ") + pc.white(destination));
	console.log(pc.dim("  └────────────────────────────────────────────"));
	console.log();
}

function printSummary(total: number, downloaded: number, failed: number) {
	console.log();
	console.log(pc.bold(pc.white("  ╭─────────────────────────────────╮")));
	console.log(pc.bold(pc.white("  │")) + pc.bold("         📊 Summary               ") + pc.bold(pc.white("│")));
	console.log(pc.bold(pc.white("  ├─────────────────────────────────┤")));
	console.log(pc.bold(pc.white("  │")) + pc.white(` ○ Processed:  ${String(total).padStart(4)} tracks        `) + pc.bold(pc.white("│")));
	console.log(pc.bold(pc.white("  │")) + pc.green(` ✓ Downloaded: ${String(downloaded).padStart(4)} tracks        `) + pc.bold(pc.white("│")));
	if (failed > 0) {
		console.log(pc.bold(pc.white("  │")) + pc.red(` ✗ Failed:     ${String(failed).padStart(4)} tracks        `) + pc.bold(pc.white("│")));
	}
	console.log(pc.bold(pc.white("  ╰─────────────────────────────────╯")));
	console.log();
}

/**
 * List every failed track with the reason yt-dlp gave
 */
export function printFailedTracks(failed: TrackResult[]) {
	if (failed.length === 0) return;

	console.log(pc.dim(`  Failed tracks (${failed.length}):`));
	for (const r of failed) {
		console.log(pc.red(`    ✗ ${r.track.artist} - ${r.track.name}: `) + pc.dim(r.error || "Unknown error"));
	}
	console.log();
}

function createProgressBar() {
	return new cliProgress.SingleBar({
		format: pc.dim("  │ ") + pc.cyan("{bar}") + pc.dim(" │ ") + pc.white("{percentage}%") + pc.dim(" │ ") + pc.dim("{value}/{total} tracks"),
		barCompleteChar: "█",
		barIncompleteChar: "░",
		hideCursor: true,
		clearOnComplete: false,
		barsize: 25,
	});
}

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Download every track listed in a playlist export CSV. Nothing is recorded
 * between runs. Resolves to the process exit code.
 */
export async function downloadCommand(
	csvPath: string,
	destination: string | undefined,
	opts: DownloadCommandOptions
): Promise<number> {
	const config = loadConfig();
	const outputDir = destination || config.sync.csvDownloadDir;

	printHeader();
	printConfig(csvPath, outputDir);

	const progressBar = createProgressBar();
	let started = false;
	let completed = 0;

	const result = await syncPlaylist({
		reference: path.parse(csvPath).name,
		destination: outputDir,
		session: csvPath,
		catalog: new CsvCatalog(),
		history: new MemoryHistoryStore(),
		fetcher: new YtDlpFetcher({
			binaryPath: config.ytDlp.path,
			audioFormat: config.ytDlp.audioFormat,
			ffmpegPath: config.ytDlp.ffmpegPath,
			timeoutMs: config.ytDlp.timeoutSeconds * 1000,
		}),
		dryRun: opts.dryRun === true,
		failureLogPath: config.sync.errorLogPath,
		quiet: true,
		onTrackStart: (_track, index, total) => {
			if (index === 1) {
				progressBar.start(total, 0);
				started = true;
			}
		},
		onTrackComplete: () => {
			completed++;
			progressBar.update(completed);
		},
	}).finally(() => {
		if (started) progressBar.stop();
	});

	if (result.dryRun) {
		reportDryRun(result.newTracks);
		console.log();
		return 0;
	}

	if (result.newTracks.length === 0) {
		console.log(pc.yellow("  ⚠ No tracks loaded. Exiting."));
		return 0;
	}

	const failed = result.results.filter((r) => r.state === "failed");
	printSummary(result.summary.processed, result.summary.succeeded, result.summary.failed);

	printFailedTracks(failed);
	if (failed.length > 0) {
		console.log(pc.dim(`  Failures were also written to ${config.sync.errorLogPath}.`));
		console.log();
	}

	console.log(pc.dim(`  Files are saved in the '${outputDir}' directory.`));
	console.log();

	return failed.length > 0 ? 1 : 0;
}
