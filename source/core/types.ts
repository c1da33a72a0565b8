export type QualityPreset = "max-video" | "max-audio" | "min-video" | "min-size";

export type BrowserName = "chrome" | "firefox" | "edge" | "brave" | "opera";

export type DownloadConfig = {
	readonly url?: string;
	readonly quality: QualityPreset;
	readonly outputDir: string;
	readonly outputTemplate?: string;
	readonly cookieBrowser?: string;
	readonly playlist: boolean;
	readonly playlistStart?: number;
	readonly playlistEnd?: number;
	readonly subtitles: boolean;
	readonly metadata: boolean;
	readonly rateLimit?: string;
	readonly retries: number;
	readonly archiveFile?: string;
	readonly verbose: boolean;
};

export type ProgressEvent = {
	percent: number;
	downloadedBytes?: number;
	totalBytes?: number;
	speedBps?: number;
	etaSec?: number;
};

export type ParseErrorReason = "missing-percent" | "invalid-percent";

export type ParseResult =
	| { kind: "no-match" }
	| { kind: "error"; reason: ParseErrorReason; line: string }
	| { kind: "event"; event: ProgressEvent };

export type FailureReason =
	| { kind: "bot-challenge" }
	| { kind: "cookie-locked" }
	| {
			kind: "generic";
			exitCode: number | null;
			signal?: NodeJS.Signals;
			diagnostic: string;
	  };

export type ProcessOutcome =
	| { kind: "success" }
	| { kind: "failure"; reason: FailureReason };

export type CommandSpec = {
	readonly command: string;
	readonly args: readonly string[];
};

export type PipelineEvents = {
	progress: { event: ProgressEvent; message: string };
	status: { line: string };
	finish: { message: string; outcome?: ProcessOutcome };
};
