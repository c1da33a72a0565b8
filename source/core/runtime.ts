import type { Logger } from "../utils/logger.js";
import { LiveProgress } from "./live-progress.js";
import { type SpawnProcess, runDownload } from "./process-runner.js";
import type { CommandSpec, ProcessOutcome } from "./types.js";

type RuntimeConfig = {
	command: CommandSpec;
	spawn?: SpawnProcess;
	logger?: Pick<Logger, "debug" | "warn">;
};

export type DownloadRuntime = {
	live: LiveProgress;
	command: CommandSpec;
	start: () => Promise<ProcessOutcome>;
};

/**
 * Pairs a command with the live display it reports to. `start` spawns the
 * child at most once; later calls return the same promise.
 */
export function createRuntime(config: RuntimeConfig): DownloadRuntime {
	const live = new LiveProgress();
	let runPromise: Promise<ProcessOutcome> | undefined;

	return {
		live,
		command: config.command,
		start: () => {
			if (!runPromise) {
				runPromise = runDownload(config.command, {
					sink: live,
					spawn: config.spawn,
					logger: config.logger,
				});
			}

			return runPromise;
		},
	};
}
