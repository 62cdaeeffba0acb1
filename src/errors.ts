export class PlaylistSyncError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = new.target.name;
	}
}

export class ConfigError extends PlaylistSyncError {}

export class AuthError extends PlaylistSyncError {}

/**
 * Raised when the playlist listing cannot be retrieved. Always fatal for a run:
 * nothing has been written to history yet.
 */
export class CatalogError extends PlaylistSyncError {
	status?: number;

	constructor(message: string, status?: number) {
		super(message);
		this.status = status;
	}
}

export class HistoryReadError extends PlaylistSyncError {
	path: string;
	code?: string;

	constructor(path: string, cause: unknown) {
		super(`Failed to read history file ${path}: ${errorMessage(cause)}`, { cause });
		this.path = path;
		this.code = errorCode(cause);
	}
}

/**
 * The fetch mechanism itself is unusable (e.g. the yt-dlp binary is missing).
 * Every remaining track would fail the same way, so the run aborts.
 */
export class FetcherUnavailableError extends PlaylistSyncError {}

export class CsvFormatError extends PlaylistSyncError {}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/** System error code (`ENOENT`, `EACCES`, ...) of a Node.js error, if any */
export function errorCode(error: unknown): string | undefined {
	if (error instanceof Error && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return undefined;
}
