export {
	YtDlpFetcher,
	buildYtDlpArgs,
	outputBaseName,
	sanitizeFileName,
	type YtDlpOptions,
} from "./yt-dlp.js";
