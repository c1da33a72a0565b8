import { EventEmitter } from "node:events";
import type { PipelineEvents, ProcessOutcome, ProgressEvent } from "./types.js";

export type ProgressSink = {
	progress(event: ProgressEvent, message: string): void;
	status(line: string): void;
	finish(message: string, outcome?: ProcessOutcome): void;
};

export type LiveProgressState = {
	percent: number;
	message: string;
	finished: boolean;
};

/**
 * Display sink that fans pipeline updates out to whichever view is attached
 * (the Ink app or the plain line renderer). Only the stdout consumer writes
 * to it.
 */
export class LiveProgress extends EventEmitter implements ProgressSink {
	#state: LiveProgressState = { percent: 0, message: "", finished: false };

	get state(): Readonly<LiveProgressState> {
		return this.#state;
	}

	override on<K extends keyof PipelineEvents>(
		event: K,
		listener: (payload: PipelineEvents[K]) => void,
	): this {
		return super.on(event, listener);
	}

	override off<K extends keyof PipelineEvents>(
		event: K,
		listener: (payload: PipelineEvents[K]) => void,
	): this {
		return super.off(event, listener);
	}

	override emit<K extends keyof PipelineEvents>(
		event: K,
		payload: PipelineEvents[K],
	): boolean {
		return super.emit(event, payload);
	}

	progress(event: ProgressEvent, message: string): void {
		if (this.#state.finished) {
			return;
		}

		this.#state = { ...this.#state, percent: event.percent, message };
		this.emit("progress", { event, message });
	}

	status(line: string): void {
		if (this.#state.finished) {
			return;
		}

		this.emit("status", { line });
	}

	finish(message: string, outcome?: ProcessOutcome): void {
		if (this.#state.finished) {
			return;
		}

		this.#state = { ...this.#state, message, finished: true };
		this.emit("finish", { message, outcome });
	}
}
