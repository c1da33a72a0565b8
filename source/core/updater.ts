import { spawn } from "node:child_process";
import type { Logger } from "../utils/logger.js";

export type RunStatus = (command: string, args: string[]) => Promise<number>;

export type UpdateOptions = {
	executable: string;
	run?: RunStatus;
	logger?: Pick<Logger, "info" | "warn" | "success">;
};

export type UpdateResult = {
	updated: boolean;
	via?: string;
};

/**
 * Best-effort yt-dlp self-update: pip first, then `yt-dlp --update`.
 * Resolves in every case; a failed update only logs a warning.
 */
export async function updateTool(options: UpdateOptions): Promise<UpdateResult> {
	const run = options.run ?? runStatus;
	const attempts: Array<{ via: string; command: string; args: string[] }> = [
		{ via: "pip", command: "pip", args: ["install", "--upgrade", "yt-dlp"] },
		{ via: "yt-dlp --update", command: options.executable, args: ["--update"] },
	];

	options.logger?.info("Updating yt-dlp...");
	for (const attempt of attempts) {
		try {
			if ((await run(attempt.command, attempt.args)) === 0) {
				options.logger?.success(`yt-dlp is up to date (${attempt.via}).`);
				return { updated: true, via: attempt.via };
			}
		} catch (error) {
			const message = error instanceof Error ? error.message : String(error);
			options.logger?.warn(`${attempt.via} update failed: ${message}`);
		}
	}

	options.logger?.warn(
		"skipped the yt-dlp update; you may need to update it manually.",
	);
	return { updated: false };
}

function runStatus(command: string, args: string[]): Promise<number> {
	return new Promise((resolve, reject) => {
		const child = spawn(command, args, { stdio: "ignore", shell: false });
		child.once("error", reject);
		child.once("close", (code) => resolve(code ?? 1));
	});
}
