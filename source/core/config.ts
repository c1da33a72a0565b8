import path from "node:path";
import { InvalidInputError } from "./errors.js";
import { describeQuality } from "./quality.js";
import type { DownloadConfig, QualityPreset } from "./types.js";

export const DEFAULT_OUTPUT_DIR = "./downloads";
export const DEFAULT_OUTPUT_TEMPLATE = "%(title)s-%(id)s.%(ext)s";
export const DEFAULT_ARCHIVE_FILENAME = "downloaded.txt";
export const DEFAULT_RETRIES = 3;

export type ConfigInput = {
	url?: string;
	quality?: QualityPreset;
	outputDir?: string;
	outputTemplate?: string;
	cookieBrowser?: string;
	playlist?: boolean;
	playlistStart?: number;
	playlistEnd?: number;
	subtitles?: boolean;
	metadata?: boolean;
	rateLimit?: string;
	retries?: number;
	archiveFile?: string;
	noArchive?: boolean;
	verbose?: boolean;
};

/**
 * Builds the run configuration from merged CLI and interactive input,
 * filling defaults, then validates and freezes it.
 */
export function createDownloadConfig(input: ConfigInput): DownloadConfig {
	const outputDir = nonBlank(input.outputDir) ?? DEFAULT_OUTPUT_DIR;
	const archiveFile = input.noArchive
		? undefined
		: (nonBlank(input.archiveFile) ??
			path.join(outputDir, DEFAULT_ARCHIVE_FILENAME));

	const config: DownloadConfig = {
		url: nonBlank(input.url),
		quality: input.quality ?? "max-video",
		outputDir,
		outputTemplate: nonBlank(input.outputTemplate),
		cookieBrowser: nonBlank(input.cookieBrowser),
		playlist: input.playlist ?? false,
		playlistStart: input.playlistStart,
		playlistEnd: input.playlistEnd,
		subtitles: input.subtitles ?? false,
		metadata: input.metadata ?? false,
		rateLimit: nonBlank(input.rateLimit),
		retries: input.retries ?? DEFAULT_RETRIES,
		archiveFile,
		verbose: input.verbose ?? false,
	};

	validateConfig(config);
	return Object.freeze(config);
}

export function validateConfig(config: DownloadConfig): void {
	const { playlistStart: start, playlistEnd: end } = config;

	for (const [label, value] of [
		["start", start],
		["end", end],
	] as const) {
		if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
			throw new InvalidInputError(
				`Playlist ${label} must be a positive whole number (items are counted from 1), got ${value}.`,
			);
		}
	}

	if (start !== undefined && end !== undefined && start > end) {
		throw new InvalidInputError(
			`Playlist start (${start}) is after playlist end (${end}).`,
		);
	}

	if (!Number.isInteger(config.retries) || config.retries < 0) {
		throw new InvalidInputError(
			`Retries must be a non-negative whole number, got ${config.retries}.`,
		);
	}
}

export function describeConfig(config: DownloadConfig): string[] {
	const lines: string[] = [];
	if (config.url) {
		lines.push(`URL:       ${config.url}`);
	}
	lines.push(`Quality:   ${config.quality} (${describeQuality(config.quality)})`);
	lines.push(`Output:    ${config.outputDir}`);
	lines.push(
		`Cookies:   ${config.cookieBrowser ? `from ${config.cookieBrowser}` : "none (public videos only)"}`,
	);

	if (config.playlist) {
		const range = [
			config.playlistStart !== undefined ? `from ${config.playlistStart}` : "",
			config.playlistEnd !== undefined ? `to ${config.playlistEnd}` : "",
		]
			.filter(Boolean)
			.join(" ");
		lines.push(`Playlist:  whole playlist${range ? ` (${range})` : ""}`);
	}

	if (config.subtitles) {
		lines.push("Subtitles: yes");
	}
	if (config.metadata) {
		lines.push("Metadata:  yes");
	}
	if (config.rateLimit) {
		lines.push(`Rate:      ${config.rateLimit}`);
	}
	lines.push(`Retries:   ${config.retries}`);
	if (config.archiveFile) {
		lines.push(`Archive:   ${config.archiveFile}`);
	}

	return lines;
}

function nonBlank(value?: string): string | undefined {
	const trimmed = value?.trim();
	return trimmed ? trimmed : undefined;
}
