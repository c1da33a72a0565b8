import type { FailureReason } from "./types.js";

export class TubebatchError extends Error {
	readonly exitCode: 1 | 2 | 3;

	constructor(message: string, exitCode: 1 | 2 | 3) {
		super(message);
		this.name = this.constructor.name;
		this.exitCode = exitCode;
	}
}

export class InvalidInputError extends TubebatchError {
	constructor(message: string) {
		super(message, 2);
	}
}

export class MissingUrlError extends InvalidInputError {
	constructor() {
		super("A video or playlist URL is required.");
	}
}

export class UnsupportedBrowserError extends InvalidInputError {
	readonly browser: string;

	constructor(browser: string) {
		super(
			`Unsupported browser: ${browser}. Use chrome, firefox, edge, brave or opera.`,
		);
		this.browser = browser;
	}
}

export class DependencyError extends TubebatchError {
	constructor(message: string) {
		super(message, 3);
	}
}

export class ProcessLaunchError extends DependencyError {
	readonly command: string;

	constructor(command: string, cause: Error) {
		super(
			`Could not start ${command}: ${cause.message}. Install yt-dlp (https://github.com/yt-dlp/yt-dlp) or point --yt-dlp at the executable.`,
		);
		this.command = command;
		this.cause = cause;
	}
}

export class DownloadError extends TubebatchError {
	readonly reason?: FailureReason;
	readonly remediation: string[];

	constructor(message: string, reason?: FailureReason, remediation: string[] = []) {
		super(message, 1);
		this.reason = reason;
		this.remediation = remediation;
	}
}

export function toExitCode(error: unknown): 1 | 2 | 3 {
	if (error instanceof TubebatchError) {
		return error.exitCode;
	}

	return 1;
}
