#!/usr/bin/env node

import { Command } from "commander";
import pc from "picocolors";
import { downloadCommand } from "./cli/download.js";
import { loginCommand } from "./cli/login.js";
import { syncCommand } from "./cli/sync.js";
import { errorMessage } from "./errors.js";

const program = new Command();

program
	.name("plsync")
	.description("Keep a local folder in sync with a Spotify playlist, downloading only new tracks")
	.version("1.0.0");

function run(task: () => Promise<number>): Promise<void> {
	return task().then(
		(code) => {
			process.exitCode = code;
		},
		(e: unknown) => {
			console.error(pc.red("Error:"), errorMessage(e));
			process.exitCode = 1;
		}
	);
}

program
	.command("sync", { isDefault: true })
	.alias("s")
	.description("Download playlist tracks that are not in the playlist's history yet")
	.argument("<playlist>", "Spotify playlist link, URI or ID")
	.argument("<destination>", "Folder to download songs into")
	.option("--dry-run", "List new songs not in history without downloading or recording")
	.option("--history-dir <dir>", "Folder holding per-playlist history files")
	.action((playlist: string, destination: string, opts: { dryRun?: boolean; historyDir?: string }) =>
		run(() => syncCommand(playlist, destination, opts))
	);

program
	.command("download")
	.alias("d")
	.description("Download every track listed in a playlist export CSV (no history)")
	.argument("<csv>", "CSV file with 'Track Name' and 'Artist Name(s)' columns")
	.argument("[destination]", "Folder to download songs into")
	.option("--dry-run", "List the tracks without downloading")
	.action((csv: string, destination: string | undefined, opts: { dryRun?: boolean }) =>
		run(() => downloadCommand(csv, destination, opts))
	);

program
	.command("login")
	.description("Log in to Spotify and cache the token")
	.action(() => run(loginCommand));

program.parseAsync().catch((e: unknown) => {
	console.error(pc.red("Error:"), errorMessage(e));
	process.exit(1);
});
