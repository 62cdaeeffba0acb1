/**
 * Track fetcher backed by the yt-dlp CLI
 *
 * Searches YouTube for "<artist> - <track>", takes the first result and
 * extracts the audio into the destination directory.
 */

import { spawn } from "child_process";
import fs from "fs";
import path from "path";
import { FetcherUnavailableError, errorCode } from "../errors.js";
import type { FetchOutcome, FetchRequest, TrackFetcher } from "../sync/types.js";

export interface YtDlpOptions {
	binaryPath: string;
	audioFormat: string;
	ffmpegPath?: string;
	/** Kill the process after this many milliseconds; 0 disables the limit */
	timeoutMs?: number;
}

const MAX_FILE_NAME_LENGTH = 200;

const FORMAT_EXTENSIONS: Record<string, string> = {
	vorbis: "ogg",
};

/**
 * Sanitize a string for use as a file name
 */
export function sanitizeFileName(name: string): string {
	const cleaned = name
		.replace(/[<>:"/\\|?*]/g, "_") // Replace invalid chars
		.replace(/\s+/g, " ")
		.replace(/\.+$/g, "")
		.trim();
	// Cut by code point so a surrogate pair is never split
	return Array.from(cleaned).slice(0, MAX_FILE_NAME_LENGTH).join("");
}

export function outputBaseName(request: Pick<FetchRequest, "track" | "artist">): string {
	return sanitizeFileName(`${request.artist} - ${request.track}`);
}

export function buildYtDlpArgs(request: FetchRequest, options: YtDlpOptions): string[] {
	const query = `${request.artist} - ${request.track}`;
	// yt-dlp treats % as the start of a template field
	const template = path.join(request.destination, `${outputBaseName(request).replace(/%/g, "%%")}.%(ext)s`);

	return [
		"-x",
		"--audio-format",
		options.audioFormat,
		"--audio-quality",
		"0",
		"--quiet",
		...(options.ffmpegPath ? ["--ffmpeg-location", options.ffmpegPath] : []),
		"-o",
		template,
		`ytsearch1:${query}`,
	];
}

export class YtDlpFetcher implements TrackFetcher {
	private options: YtDlpOptions;

	constructor(options: YtDlpOptions) {
		this.options = options;
	}

	async fetch(request: FetchRequest): Promise<FetchOutcome> {
		await fs.promises.mkdir(request.destination, { recursive: true });

		const args = buildYtDlpArgs(request, this.options);
		const extension = FORMAT_EXTENSIONS[this.options.audioFormat] ?? this.options.audioFormat;
		const filePath = path.join(request.destination, `${outputBaseName(request)}.${extension}`);
		const timeoutMs = this.options.timeoutMs ?? 0;

		return new Promise<FetchOutcome>((resolve, reject) => {
			const proc = spawn(this.options.binaryPath, args, {
				stdio: ["ignore", "ignore", "pipe"],
			});

			let stderr = "";
			let timedOut = false;
			const timer =
				timeoutMs > 0
					? setTimeout(() => {
							timedOut = true;
							proc.kill("SIGKILL");
						}, timeoutMs)
					: undefined;

			proc.stderr?.on("data", (data: Buffer) => {
				stderr += data.toString();
			});

			let spawned = false;
			proc.on("spawn", () => {
				spawned = true;
			});

			proc.on("error", (error) => {
				clearTimeout(timer);
				if (!spawned) {
					// Never started: every remaining track would fail the same way
					const reason =
						errorCode(error) === "ENOENT"
							? `'${this.options.binaryPath}' command not found. Make sure yt-dlp is installed and on your PATH.`
							: `Could not start '${this.options.binaryPath}': ${error.message}`;
					reject(new FetcherUnavailableError(reason, { cause: error }));
					return;
				}
				resolve({ success: false, error: error.message });
			});

			proc.on("close", (code) => {
				clearTimeout(timer);
				if (timedOut) {
					resolve({ success: false, error: `yt-dlp timed out after ${timeoutMs}ms` });
				} else if (code === 0) {
					resolve({ success: true, filePath });
				} else {
					resolve({ success: false, error: stderr.trim() || `yt-dlp exited with code ${code}` });
				}
			});
		});
	}
}
