import path from "node:path";
import type { Logger } from "../utils/logger.js";
import { DEFAULT_OUTPUT_TEMPLATE } from "./config.js";
import { resolveBrowser } from "./credentials.js";
import { MissingUrlError } from "./errors.js";
import { needsAudioExtraction, toFormatSelector } from "./quality.js";
import type { BrowserName, CommandSpec, DownloadConfig } from "./types.js";

export type BuildOptions = {
	executable: string;
	platform?: NodeJS.Platform;
	logger?: Pick<Logger, "warn" | "debug">;
};

export function buildCommand(
	config: DownloadConfig,
	options: BuildOptions,
): CommandSpec {
	const url = requireUrl(config);
	const platform = options.platform ?? process.platform;
	const args = ["--newline", "--progress", "-f", toFormatSelector(config.quality)];

	if (needsAudioExtraction(config.quality)) {
		args.push("-x", "--audio-format", "mp3", "--audio-quality", "0");
	}

	const browser = resolveCookieBrowser(config, options.logger);
	if (browser) {
		args.push("--cookies-from-browser", browser);
	}

	args.push("-o", outputPath(config, platform));

	if (config.playlist) {
		if (config.playlistStart !== undefined) {
			args.push("--playlist-start", String(config.playlistStart));
		}
		if (config.playlistEnd !== undefined) {
			args.push("--playlist-end", String(config.playlistEnd));
		}
	} else {
		args.push("--no-playlist");
	}

	if (config.subtitles) {
		args.push("--write-subs", "--write-auto-subs", "--sub-lang", "ja,en");
	}

	if (config.metadata) {
		args.push("--write-info-json", "--write-description", "--write-thumbnail");
	}

	if (config.rateLimit) {
		args.push("--limit-rate", config.rateLimit);
	}

	args.push("--retries", String(config.retries));

	if (config.archiveFile) {
		args.push("--download-archive", config.archiveFile);
	}

	args.push("--no-warnings", "--ignore-errors", "--no-continue");

	if (platform === "win32") {
		args.push("--encoding", "utf-8");
	}

	// "--" ends option parsing, so a URL can never be read as a flag.
	args.push("--", url);
	return freezeSpec(options.executable, args);
}

/**
 * Metadata-only invocation: prints one JSON object per item without
 * downloading anything.
 */
export function buildInspectCommand(
	config: DownloadConfig,
	options: BuildOptions,
): CommandSpec {
	const url = requireUrl(config);
	const args = ["--dump-json", "--flat-playlist"];

	const browser = resolveCookieBrowser(config, options.logger);
	if (browser) {
		args.push("--cookies-from-browser", browser);
	}

	args.push("--", url);
	return freezeSpec(options.executable, args);
}

export function formatCommand(spec: CommandSpec): string {
	return [spec.command, ...spec.args].map(quoteArg).join(" ");
}

function quoteArg(arg: string): string {
	return /\s|["'`$\\]/.test(arg)
		? `"${arg.replaceAll("\\", "\\\\").replaceAll('"', '\\"')}"`
		: arg;
}

function requireUrl(config: DownloadConfig): string {
	const url = config.url?.trim();
	if (!url) {
		throw new MissingUrlError();
	}

	return url;
}

function resolveCookieBrowser(
	config: DownloadConfig,
	logger?: Pick<Logger, "warn" | "debug">,
): BrowserName | undefined {
	if (!config.cookieBrowser) {
		logger?.debug("no cookie browser set; YouTube may ask to confirm you are not a bot");
		return undefined;
	}

	try {
		return resolveBrowser(config.cookieBrowser);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		logger?.warn(`${message} Continuing without browser cookies.`);
		return undefined;
	}
}

function outputPath(config: DownloadConfig, platform: NodeJS.Platform): string {
	const template = config.outputTemplate ?? DEFAULT_OUTPUT_TEMPLATE;
	const join = platform === "win32" ? path.win32.join : path.posix.join;
	return join(config.outputDir, template);
}

function freezeSpec(command: string, args: string[]): CommandSpec {
	return Object.freeze({ command, args: Object.freeze([...args]) });
}
