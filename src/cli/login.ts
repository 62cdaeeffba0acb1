import ora from "ora";
import pc from "picocolors";
import { loadConfig } from "../config/index.js";
import { AuthError } from "../errors.js";
import { authorize, writeTokenCache } from "../services/spotify/index.js";
import { promptForAuthorization } from "./prompt.js";

/**
 * Authorize with Spotify and replace the cached token
 */
export async function loginCommand(): Promise<number> {
	const config = loadConfig();
	if (!config.spotify.clientId) {
		throw new AuthError("SPOTIFY_CLIENT_ID is not set. Add it to your environment or .env file.");
	}

	const spinner = ora({
		text: "Exchanging authorization code...",
		prefixText: " ",
		color: "magenta",
	});

	const tokens = await authorize(config.spotify, async (url) => {
		const answer = await promptForAuthorization(url);
		spinner.start();
		return answer;
	}).catch((error: unknown) => {
		if (spinner.isSpinning) spinner.fail(pc.red("Spotify login failed."));
		throw error;
	});

	writeTokenCache(config.spotify.tokenCachePath, tokens);
	spinner.succeed(pc.green(`Logged in. Token cached at ${pc.bold(config.spotify.tokenCachePath)}`));

	return 0;
}
