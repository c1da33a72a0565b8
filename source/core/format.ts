import type { ProgressEvent } from "./types.js";

const BYTE_UNITS = ["B", "KiB", "MiB", "GiB", "TiB"] as const;

export const UNKNOWN = "unknown";

export function formatBytes(bytes: number): string {
	let value = Math.max(0, bytes);
	let unitIndex = 0;
	while (value >= 1024 && unitIndex < BYTE_UNITS.length - 1) {
		value /= 1024;
		unitIndex += 1;
	}

	return `${value.toFixed(2)} ${BYTE_UNITS[unitIndex]}`;
}

export function formatSpeed(speedBps?: number): string {
	if (speedBps === undefined) {
		return UNKNOWN;
	}

	return `${formatBytes(Math.trunc(speedBps))}/s`;
}

// Minutes are not wrapped into hours: 3661s renders as 61:01.
export function formatDuration(totalSeconds: number): string {
	const seconds = Math.max(0, Math.floor(totalSeconds));
	const minutes = Math.floor(seconds / 60);
	const remainder = seconds % 60;
	return `${String(minutes).padStart(2, "0")}:${String(remainder).padStart(2, "0")}`;
}

export function describeProgress(event: ProgressEvent): string {
	const downloaded =
		event.downloadedBytes !== undefined
			? formatBytes(event.downloadedBytes)
			: UNKNOWN;
	const total =
		event.totalBytes !== undefined ? formatBytes(event.totalBytes) : UNKNOWN;
	const eta =
		event.etaSec !== undefined ? formatDuration(event.etaSec) : UNKNOWN;

	return `${downloaded} / ${total} | ${formatSpeed(event.speedBps)} | ETA ${eta}`;
}
