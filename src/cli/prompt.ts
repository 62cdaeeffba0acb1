import * as readline from "node:readline/promises";
import pc from "picocolors";

/**
 * Ask the user to authorize in the browser and paste back the redirect URL
 */
export async function promptForAuthorization(authorizationUrl: string): Promise<string> {
	console.log(pc.yellow("  ⚠ No cached Spotify login. Open this URL in your browser and approve access:"));
	console.log();
	console.log("  " + pc.cyan(authorizationUrl));
	console.log();
	console.log(pc.dim("    After approving, your browser is sent to the redirect URI. Copy that full URL.\n"));

	const rl = readline.createInterface({
		input: process.stdin,
		output: process.stdout,
	});

	try {
		return await rl.question(pc.cyan("  Paste redirect URL: "));
	} finally {
		rl.close();
	}
}
