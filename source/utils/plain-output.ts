import type { LiveProgress } from "../core/live-progress.js";
import type { PipelineEvents } from "../core/types.js";
import type { Logger } from "./logger.js";

/**
 * Line-oriented view of a download for pipes and CI logs. Progress is
 * printed once per 10% step instead of on every tick.
 */
export function attachPlainOutput(
	live: LiveProgress,
	logger: Pick<Logger, "info">,
): () => void {
	let lastStep = -1;

	const onProgress = ({ event, message }: PipelineEvents["progress"]) => {
		const step = Math.floor(event.percent / 10);
		if (step === lastStep) {
			return;
		}
		lastStep = step;
		logger.info(`[progress] ${event.percent.toFixed(1)}% ${message}`);
	};

	const onStatus = ({ line }: PipelineEvents["status"]) => {
		logger.info(line);
	};

	const onFinish = ({ message }: PipelineEvents["finish"]) => {
		logger.info(`[finish] ${message}`);
	};

	live.on("progress", onProgress);
	live.on("status", onStatus);
	live.on("finish", onFinish);

	return () => {
		live.off("progress", onProgress);
		live.off("status", onStatus);
		live.off("finish", onFinish);
	};
}

// Captured output is joined without a final newline.
export function terminateLine(output: string): string {
	return output.endsWith("\n") ? output : `${output}\n`;
}
