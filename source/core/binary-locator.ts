import { access, stat } from "node:fs/promises";
import path from "node:path";
import { DependencyError, ProcessLaunchError } from "./errors.js";
import { type SpawnProcess, captureOutput } from "./process-runner.js";

export const YT_DLP_ENV_VAR = "TUBEBATCH_YTDLP";

export type LocateOptions = {
	explicit?: string;
	env?: NodeJS.ProcessEnv;
	platform?: NodeJS.Platform;
};

/**
 * Finds the yt-dlp executable: an explicit path wins, then the
 * TUBEBATCH_YTDLP environment variable, then a PATH search.
 */
export async function locateExecutable(
	options: LocateOptions = {},
): Promise<string> {
	const env = options.env ?? process.env;
	const platform = options.platform ?? process.platform;

	const override = options.explicit?.trim() || env[YT_DLP_ENV_VAR]?.trim();
	if (override) {
		if (!(await isExecutableFile(override))) {
			throw new DependencyError(`yt-dlp executable not found at ${override}.`);
		}
		return override;
	}

	const found = await findBinary("yt-dlp", env, platform);
	if (!found) {
		throw new DependencyError(
			"yt-dlp was not found on PATH. Install it (pip install yt-dlp) or pass --yt-dlp <path>.",
		);
	}

	return found;
}

export async function probeVersion(
	executable: string,
	spawn?: SpawnProcess,
): Promise<string> {
	try {
		const output = await captureOutput(
			{ command: executable, args: ["--version"] },
			{ spawn },
		);
		return output.trim();
	} catch (error) {
		if (error instanceof ProcessLaunchError) {
			throw error;
		}
		const message = error instanceof Error ? error.message : String(error);
		throw new DependencyError(`${executable} --version failed: ${message}`);
	}
}

// .cmd and .bat shims need a shell, which the runner never uses.
export function executableNames(
	name: string,
	platform: NodeJS.Platform,
): string[] {
	return platform === "win32" ? [`${name}.exe`, name] : [name];
}

async function findBinary(
	name: string,
	env: NodeJS.ProcessEnv,
	platform: NodeJS.Platform,
): Promise<string | undefined> {
	const { PATH: pathValue } = env;
	if (!pathValue) {
		return undefined;
	}

	const pathApi = platform === "win32" ? path.win32 : path.posix;
	for (const dir of pathValue.split(pathApi.delimiter)) {
		if (!dir) {
			continue;
		}
		for (const candidate of executableNames(name, platform)) {
			const fullPath = pathApi.join(dir, candidate);
			if (await isExecutableFile(fullPath)) {
				return fullPath;
			}
		}
	}

	return undefined;
}

async function isExecutableFile(filePath: string): Promise<boolean> {
	try {
		await access(filePath);
		const info = await stat(filePath);
		return info.isFile();
	} catch {
		return false;
	}
}
