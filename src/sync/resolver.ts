/**
 * Extract the playlist ID from a share URL (`https://open.spotify.com/playlist/<id>?si=...`),
 * a URI (`spotify:playlist:<id>`) or a bare ID. The result is not validated; a bad
 * ID only shows up when the catalog request fails.
 */
export function resolvePlaylistId(reference: string): string {
	const urlMarker = "playlist/";
	const urlIndex = reference.indexOf(urlMarker);
	if (urlIndex !== -1) {
		return reference.slice(urlIndex + urlMarker.length).split("?")[0];
	}

	const uriMarker = ":playlist:";
	const uriIndex = reference.indexOf(uriMarker);
	if (uriIndex !== -1) {
		return reference.slice(uriIndex + uriMarker.length);
	}

	return reference;
}
