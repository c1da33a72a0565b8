import { Box, Static, Text, useApp, useInput } from "ink";
import { useEffect, useState } from "react";
import type { DownloadRuntime } from "./core/runtime.js";
import { formatDuration } from "./core/format.js";
import type { PipelineEvents, ProcessOutcome } from "./core/types.js";

type Props = {
	runtime: DownloadRuntime;
	title: string;
};

type StatusLine = {
	id: string;
	line: string;
};

type Phase = "running" | "done" | "failed";

const SPINNER_FRAMES = ["-", "\\", "|", "/"] as const;

export default function App({ runtime, title }: Props) {
	const { exit } = useApp();
	const [startedAt] = useState(() => Date.now());
	const [now, setNow] = useState(() => Date.now());
	const [tick, setTick] = useState(0);
	const [showDetails, setShowDetails] = useState(true);
	const [percent, setPercent] = useState(0);
	const [message, setMessage] = useState("waiting for yt-dlp...");
	const [statusLines, setStatusLines] = useState<StatusLine[]>([]);
	const [phase, setPhase] = useState<Phase>("running");

	useInput((input) => {
		if (input === "d") {
			setShowDetails((value) => !value);
		}
	});

	useEffect(() => {
		const timeInterval = setInterval(() => setNow(Date.now()), 1000);
		const spinnerInterval = setInterval(
			() => setTick((value) => value + 1),
			120,
		);

		return () => {
			clearInterval(timeInterval);
			clearInterval(spinnerInterval);
		};
	}, []);

	useEffect(() => {
		const { live } = runtime;

		const onProgress = (payload: PipelineEvents["progress"]) => {
			setPercent(payload.event.percent);
			setMessage(payload.message);
		};

		const onStatus = (payload: PipelineEvents["status"]) => {
			setStatusLines((prev) => [
				...prev,
				{ id: `${Date.now()}-${prev.length}`, line: payload.line },
			]);
		};

		const onFinish = (payload: PipelineEvents["finish"]) => {
			setPhase(toPhase(payload.outcome));
			setMessage(payload.message);
			if (payload.outcome?.kind === "success") {
				setPercent(100);
			}
		};

		live.on("progress", onProgress);
		live.on("status", onStatus);
		live.on("finish", onFinish);

		// Errors are reported by the caller once Ink has unmounted.
		void runtime
			.start()
			.catch(() => setPhase("failed"))
			.finally(() => {
				exit();
			});

		return () => {
			live.off("progress", onProgress);
			live.off("status", onStatus);
			live.off("finish", onFinish);
		};
	}, [runtime, exit]);

	const spinner = SPINNER_FRAMES[tick % SPINNER_FRAMES.length] ?? "-";
	const elapsedSec = Math.max(0, Math.floor((now - startedAt) / 1000));
	const color = phaseToColor(phase);

	return (
		<Box flexDirection="column" width="100%">
			<Static items={statusLines}>
				{(status) => (
					<Text key={status.id} color="gray">
						{status.line}
					</Text>
				)}
			</Static>

			<Box
				borderStyle="round"
				borderColor={color}
				flexDirection="column"
				paddingX={1}
			>
				<Box justifyContent="space-between">
					<Text color={color} bold>
						{phase === "running" ? spinner : phase === "done" ? "✓" : "x"}{" "}
						{title}
					</Text>
					<Text color="gray">elapsed {formatDuration(elapsedSec)}</Text>
				</Box>
				<Text color={color}>
					{renderBar(percent, 40)} {percent.toFixed(1)}%
				</Text>
				{showDetails ? <Text color="gray">{message}</Text> : null}
				<Text color="gray">d toggle details</Text>
			</Box>
		</Box>
	);
}

function toPhase(outcome?: ProcessOutcome): Phase {
	return outcome?.kind === "success" ? "done" : "failed";
}

function phaseToColor(phase: Phase): "cyan" | "green" | "red" {
	switch (phase) {
		case "running":
			return "cyan";
		case "done":
			return "green";
		case "failed":
			return "red";
	}
}

function renderBar(percent: number, width: number): string {
	const clamped = Math.max(0, Math.min(100, percent));
	const filled = Math.round((clamped / 100) * width);
	return `[${"#".repeat(filled)}${"-".repeat(Math.max(0, width - filled))}]`;
}
