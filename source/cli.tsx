#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import { createInterface } from "node:readline/promises";
import chalk from "chalk";
import { render } from "ink";
import meow from "meow";
import App from "./app.js";
import { locateExecutable, probeVersion } from "./core/binary-locator.js";
import {
	buildCommand,
	buildInspectCommand,
	formatCommand,
} from "./core/command-builder.js";
import {
	type ConfigInput,
	DEFAULT_OUTPUT_DIR,
	createDownloadConfig,
	describeConfig,
} from "./core/config.js";
import { locateCookieStore, resolveBrowser } from "./core/credentials.js";
import {
	DownloadError,
	InvalidInputError,
	MissingUrlError,
	toExitCode,
} from "./core/errors.js";
import { describeFailure } from "./core/outcome.js";
import { captureOutput } from "./core/process-runner.js";
import {
	QUALITY_PRESETS,
	describeQuality,
	parseQualityPreset,
} from "./core/quality.js";
import { createRuntime } from "./core/runtime.js";
import type { DownloadConfig, QualityPreset } from "./core/types.js";
import { updateTool } from "./core/updater.js";
import { ensureOutputDir } from "./utils/fs.js";
import { type Logger, createLogger } from "./utils/logger.js";
import { attachPlainOutput, terminateLine } from "./utils/plain-output.js";
import { looksLikePlaylist, parseHttpUrl } from "./utils/url-detect.js";

const cli = meow(
	`
	Usage
	  $ tubebatch [url] [options]

	Options
	  -q, --quality <preset>      max-video|max-audio|min-video|min-size (default: max-video)
	  -o, --output <dir>          Output directory (default: ${DEFAULT_OUTPUT_DIR})
	  --output-template <tmpl>    yt-dlp filename template (default: %(title)s-%(id)s.%(ext)s)
	  -c, --cookies <browser>     Use cookies from chrome|firefox|edge|brave|opera
	  -p, --playlist              Download the whole playlist
	  --from <n>                  First playlist item (1-based)
	  --to <n>                    Last playlist item (1-based)
	  -s, --subtitles             Also fetch subtitles (ja, en)
	  -m, --metadata              Also save info JSON, description and thumbnail
	  --limit-rate <rate>         Bandwidth cap passed to yt-dlp, e.g. 1M or 500K
	  -r, --retries <n>           Retry count passed to yt-dlp (default: 3)
	  --download-archive <file>   Archive of downloaded ids (default: <output>/downloaded.txt)
	  --no-archive                Do not record or skip already downloaded items
	  --yt-dlp <path>             yt-dlp executable (default: $TUBEBATCH_YTDLP or PATH)
	  --update                    Update yt-dlp before downloading
	  --dry-run                   Print item metadata as JSON without downloading
	  --non-interactive           Never prompt; fail when the URL is missing
	  --no-progress               Disable the live progress view
	  -v, --verbose               Verbose logs

	Examples
	  $ tubebatch "https://www.youtube.com/watch?v=VIDEO_ID"
	  $ tubebatch "https://www.youtube.com/playlist?list=LIST_ID" -p --from 2 --to 5 -q max-audio
	`,
	{
		importMeta: import.meta,
		flags: {
			quality: {
				type: "string",
				shortFlag: "q",
				default: "max-video",
			},
			output: {
				type: "string",
				shortFlag: "o",
			},
			outputTemplate: {
				type: "string",
			},
			cookies: {
				type: "string",
				shortFlag: "c",
			},
			playlist: {
				type: "boolean",
				shortFlag: "p",
				default: false,
			},
			from: {
				type: "number",
			},
			to: {
				type: "number",
			},
			subtitles: {
				type: "boolean",
				shortFlag: "s",
				default: false,
			},
			metadata: {
				type: "boolean",
				shortFlag: "m",
				default: false,
			},
			limitRate: {
				type: "string",
			},
			retries: {
				type: "number",
				shortFlag: "r",
				default: 3,
			},
			downloadArchive: {
				type: "string",
			},
			archive: {
				type: "boolean",
				default: true,
			},
			ytDlp: {
				type: "string",
			},
			update: {
				type: "boolean",
				default: false,
			},
			dryRun: {
				type: "boolean",
				default: false,
			},
			nonInteractive: {
				type: "boolean",
				default: false,
			},
			progress: {
				type: "boolean",
				default: true,
			},
			verbose: {
				type: "boolean",
				shortFlag: "v",
				default: false,
			},
		},
	},
);

const logger = createLogger({ verbose: cli.flags.verbose });

try {
	await main();
} catch (error) {
	reportError(error);
	process.exitCode = toExitCode(error);
}

async function main(): Promise<void> {
	printStartupBanner(await getCliVersion());

	if (cli.input.length > 1) {
		throw new InvalidInputError(
			"Expected at most one URL argument: tubebatch [url] [options]",
		);
	}

	const config = createDownloadConfig(await resolveConfigInput());

	const executable = await locateExecutable({ explicit: cli.flags.ytDlp });
	if (cli.flags.update) {
		await updateTool({ executable, logger });
	}
	logger.info(`yt-dlp ${await probeVersion(executable)}`);

	console.log("");
	for (const line of describeConfig(config)) {
		console.log(chalk.rgb(145, 170, 205)(line));
	}
	console.log("");

	if (cli.flags.dryRun) {
		const spec = buildInspectCommand(config, { executable, logger });
		logger.debug(`exec ${formatCommand(spec)}`);
		process.stdout.write(terminateLine(await captureOutput(spec, { logger })));
		return;
	}

	await ensureOutputDir(config.outputDir);
	await probeCookies(config);

	const command = buildCommand(config, { executable, logger });
	logger.debug(`exec ${formatCommand(command)}`);

	const runtime = createRuntime({ command, logger });
	if (cli.flags.progress && process.stdout.isTTY && process.stdin.isTTY) {
		const ui = render(<App runtime={runtime} title={config.url ?? "download"} />);
		await ui.waitUntilExit();
	} else {
		attachPlainOutput(runtime.live, logger);
	}

	const outcome = await runtime.start();
	if (outcome.kind === "failure") {
		const { headline, remediation } = describeFailure(outcome.reason);
		throw new DownloadError(headline, outcome.reason, remediation);
	}

	logger.success("All downloads finished.");
	logger.info(`Files are in ${config.outputDir}`);
}

async function probeCookies(config: DownloadConfig): Promise<void> {
	if (!config.cookieBrowser) {
		return;
	}

	let browser: ReturnType<typeof resolveBrowser>;
	try {
		browser = resolveBrowser(config.cookieBrowser);
	} catch {
		// buildCommand reports unsupported browsers.
		return;
	}

	const probe = await locateCookieStore(browser, { logger });
	if (probe.found) {
		logger.debug(`using ${browser} cookies (${probe.path})`);
	}
}

function reportError(error: unknown): void {
	const message = error instanceof Error ? error.message : String(error);
	logger.error(`\n${message}`);
	if (error instanceof DownloadError) {
		for (const line of error.remediation) {
			console.error(chalk.gray(`  ${line}`));
		}
	}
}

async function getCliVersion(): Promise<string> {
	const { npm_package_version: envVersion } = process.env;
	if (envVersion) {
		return envVersion;
	}

	try {
		const packageJsonPath = new URL("../package.json", import.meta.url);
		const raw = await readFile(packageJsonPath, "utf8");
		const parsed: unknown = JSON.parse(raw);
		if (
			typeof parsed === "object" &&
			parsed !== null &&
			"version" in parsed &&
			typeof parsed.version === "string"
		) {
			return parsed.version;
		}
		return "0.0.0";
	} catch {
		return "0.0.0";
	}
}

function printStartupBanner(version: string): void {
	const bannerLines = String.raw`
 _         _          _           _       _
| |_ _   _| |__   ___| |__   __ _| |_ ___| |__
| __| | | | '_ \ / _ \ '_ \ / _' | __/ __| '_ \
| |_| |_| | |_) |  __/ |_) | (_| | || (__| | | |
 \__|\__,_|_.__/ \___|_.__/ \__,_|\__\___|_| |_|
`
		.replace(/^\n/, "")
		.trimEnd()
		.split("\n");

	const gradient = [
		[255, 60, 60],
		[255, 95, 80],
		[255, 130, 100],
		[255, 165, 130],
		[255, 200, 170],
	] as const;
	const fallbackColor: readonly [number, number, number] = [255, 200, 170];

	for (const [index, line] of bannerLines.entries()) {
		const color = gradient[index] ?? fallbackColor;
		const [r, g, b] = color;
		console.log(chalk.rgb(r, g, b).bold(line));
	}

	console.log(chalk.rgb(255, 120, 90)(`tubebatch v${version}`));
	console.log(
		chalk.rgb(
			145,
			170,
			205,
		)("Batch video and playlist downloader powered by yt-dlp."),
	);
	console.log("");
}

async function resolveConfigInput(): Promise<ConfigInput> {
	const flags = cli.flags;
	const base: ConfigInput = {
		quality: parseQualityPreset(flags.quality),
		outputDir: flags.output,
		outputTemplate: flags.outputTemplate,
		cookieBrowser: flags.cookies,
		playlist: flags.playlist,
		playlistStart: flags.from,
		playlistEnd: flags.to,
		subtitles: flags.subtitles,
		metadata: flags.metadata,
		rateLimit: flags.limitRate,
		retries: flags.retries,
		archiveFile: flags.downloadArchive,
		noArchive: !flags.archive,
		verbose: flags.verbose,
	};

	const inputUrl = cli.input[0];
	if (inputUrl) {
		return { ...base, url: parseHttpUrl(inputUrl).toString() };
	}

	if (flags.nonInteractive || !process.stdin.isTTY) {
		throw new MissingUrlError();
	}

	return promptInteractiveInput(base);
}

async function promptInteractiveInput(base: ConfigInput): Promise<ConfigInput> {
	const rl = createInterface({
		input: process.stdin,
		output: process.stdout,
	});

	try {
		console.log("tubebatch interactive setup");
		console.log("");

		const url = parseHttpUrl(
			await askRequired(rl, "Video or playlist URL", logger),
		);

		console.log("");
		for (const [index, preset] of QUALITY_PRESETS.entries()) {
			console.log(`  ${index + 1}. ${preset} - ${describeQuality(preset)}`);
		}
		const qualityAnswer = await rl.question("Quality [1-4, Enter=1]: ");
		const quality: QualityPreset =
			QUALITY_PRESETS[Number(qualityAnswer.trim()) - 1] ?? "max-video";

		const playlist = looksLikePlaylist(url)
			? await askYesNo(rl, "Download the whole playlist?")
			: base.playlist;
		const subtitles = await askYesNo(rl, "Download subtitles too?");

		return {
			...base,
			url: url.toString(),
			quality,
			playlist,
			subtitles,
		};
	} finally {
		rl.close();
	}
}

async function askRequired(
	rl: ReturnType<typeof createInterface>,
	label: string,
	output: Pick<Logger, "warn">,
): Promise<string> {
	for (;;) {
		const answer = await rl.question(`${label}: `);
		if (answer.trim()) {
			return answer.trim();
		}
		output.warn(`${label} is required.`);
	}
}

async function askYesNo(
	rl: ReturnType<typeof createInterface>,
	label: string,
): Promise<boolean> {
	const answer = await rl.question(`${label} [y/N]: `);
	return ["y", "yes"].includes(answer.trim().toLowerCase());
}
