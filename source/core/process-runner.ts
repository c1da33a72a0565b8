import {
	type ChildProcess,
	type SpawnOptions,
	spawn,
} from "node:child_process";
import { createInterface } from "node:readline";
import type { Readable } from "node:stream";
import type { Logger } from "../utils/logger.js";
import { DownloadError, ProcessLaunchError } from "./errors.js";
import { describeProgress } from "./format.js";
import type { ProgressSink } from "./live-progress.js";
import { classifyOutcome, describeFailure } from "./outcome.js";
import { parseProgressLine } from "./progress-parser.js";
import type { CommandSpec, ProcessOutcome } from "./types.js";

export type SpawnProcess = (
	command: string,
	args: readonly string[],
	options: SpawnOptions,
) => ChildProcess;

export type RunOptions = {
	sink: ProgressSink;
	spawn?: SpawnProcess;
	logger?: Pick<Logger, "debug" | "warn">;
};

type ExitStatus = {
	code: number | null;
	signal: NodeJS.Signals | null;
};

type RunningChild = {
	child: ChildProcess;
	exited: Promise<ExitStatus>;
};

/**
 * Runs yt-dlp to completion: stdout feeds the progress parser and the sink,
 * stderr is buffered for failure classification. The sink is always
 * finished before this resolves or rejects.
 */
export async function runDownload(
	spec: CommandSpec,
	options: RunOptions,
): Promise<ProcessOutcome> {
	const { sink, logger } = options;
	let outcome: ProcessOutcome | undefined;

	try {
		const { child, exited } = await launch(
			spec,
			options.spawn ?? spawn,
			logger,
		);

		const [, diagnostic] = await Promise.all([
			consumeLines(child.stdout, logger, (rawLine) => {
				const line = rawLine.trimEnd();
				logger?.debug(line);
				const parsed = parseProgressLine(line);
				switch (parsed.kind) {
					case "event":
						sink.progress(parsed.event, describeProgress(parsed.event));
						break;
					case "error":
						// Notices such as "Destination: ..." carry no percent.
						if (parsed.reason === "missing-percent") {
							sink.status(line);
						}
						break;
				}
			}),
			collectText(child.stderr, logger),
		]);

		const { code, signal } = await exited;
		outcome = classifyOutcome(code, signal, diagnostic);
		return outcome;
	} finally {
		sink.finish(finishMessage(outcome), outcome);
	}
}

/**
 * Runs a short-lived command (version probe, dry run) and returns its stdout.
 */
export async function captureOutput(
	spec: CommandSpec,
	options: Pick<RunOptions, "spawn" | "logger"> = {},
): Promise<string> {
	const { child, exited } = await launch(
		spec,
		options.spawn ?? spawn,
		options.logger,
	);
	const [output, diagnostic] = await Promise.all([
		collectText(child.stdout, options.logger),
		collectText(child.stderr, options.logger),
	]);
	const { code, signal } = await exited;

	const outcome = classifyOutcome(code, signal, diagnostic);
	if (outcome.kind === "failure") {
		const { headline, remediation } = describeFailure(outcome.reason);
		throw new DownloadError(headline, outcome.reason, remediation);
	}

	return output;
}

async function launch(
	spec: CommandSpec,
	spawnProcess: SpawnProcess,
	logger?: Pick<Logger, "warn">,
): Promise<RunningChild> {
	let child: ChildProcess;
	try {
		child = spawnProcess(spec.command, spec.args, {
			stdio: ["ignore", "pipe", "pipe"],
			shell: false,
		});
	} catch (error) {
		throw new ProcessLaunchError(spec.command, toError(error));
	}

	const exited = new Promise<ExitStatus>((resolve) => {
		child.once("exit", (code, signal) => resolve({ code, signal }));
	});

	await new Promise<void>((resolve, reject) => {
		const onSpawn = () => {
			child.off("error", onError);
			child.on("error", (error) => {
				logger?.warn(`${spec.command}: ${error.message}`);
			});
			resolve();
		};
		const onError = (error: Error) => {
			child.off("spawn", onSpawn);
			reject(new ProcessLaunchError(spec.command, error));
		};
		child.once("spawn", onSpawn);
		child.once("error", onError);
	});

	return { child, exited };
}

function consumeLines(
	stream: Readable | null,
	logger: Pick<Logger, "warn"> | undefined,
	onLine: (line: string) => void,
): Promise<void> {
	if (!stream) {
		return Promise.resolve();
	}

	return new Promise((resolve) => {
		// readline decodes as UTF-8 and replaces invalid bytes with U+FFFD.
		const reader = createInterface({ input: stream, crlfDelay: Infinity });
		let stopped = false;
		const stop = (error?: Error) => {
			if (stopped) {
				return;
			}
			stopped = true;
			if (error) {
				logger?.warn(`stopped reading yt-dlp output: ${error.message}`);
				reader.close();
			}
			resolve();
		};

		reader.on("line", onLine);
		reader.once("close", () => stop());
		reader.on("error", stop);
		stream.on("error", stop);
	});
}

async function collectText(
	stream: Readable | null,
	logger?: Pick<Logger, "warn">,
): Promise<string> {
	const lines: string[] = [];
	await consumeLines(stream, logger, (line) => {
		lines.push(line);
	});
	return lines.join("\n");
}

function finishMessage(outcome?: ProcessOutcome): string {
	if (!outcome) {
		return "yt-dlp did not run";
	}

	return outcome.kind === "success" ? "Done" : "Failed";
}

function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}
