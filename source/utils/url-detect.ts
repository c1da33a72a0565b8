import { InvalidInputError } from "../core/errors.js";

export function parseHttpUrl(input: string): URL {
	let parsed: URL;
	try {
		parsed = new URL(input.trim());
	} catch {
		throw new InvalidInputError(`Invalid URL: ${input}`);
	}

	if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
		throw new InvalidInputError(
			`Unsupported URL scheme: ${parsed.protocol}. Use http/https.`,
		);
	}

	return parsed;
}

export function looksLikePlaylist(url: URL): boolean {
	return (
		url.searchParams.has("list") ||
		url.pathname.toLowerCase().includes("playlist")
	);
}
