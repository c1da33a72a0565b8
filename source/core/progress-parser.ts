import type { ParseResult, ProgressEvent } from "./types.js";

export const DOWNLOAD_MARKER = "[download]";

// e.g. "[download]  45.2% of 123.45MiB at 1.23MiB/s ETA 00:42"
const PROGRESS_PATTERN =
	/\[download\]\s+(?:(?<percent>[^\s%]+)%)?(?:.*?\bof\s+~?\s*(?<total>\d+(?:\.\d+)?)\s*(?<totalUnit>[A-Za-z]+))?(?:.*?\bat\s+(?<speed>\d+(?:\.\d+)?)\s*(?<speedUnit>[A-Za-z]+)\/s)?(?:.*?\bETA\s+(?<eta>\S+))?/;

const UNIT_MULTIPLIERS = new Map<string, number>([
	["KiB", 1024],
	["MiB", 1024 ** 2],
	["GiB", 1024 ** 3],
]);

export function parseProgressLine(line: string): ParseResult {
	if (!line.includes(DOWNLOAD_MARKER)) {
		return { kind: "no-match" };
	}

	const groups = PROGRESS_PATTERN.exec(line)?.groups;
	const percentText = groups?.percent;
	if (!groups || percentText === undefined) {
		return { kind: "error", reason: "missing-percent", line };
	}

	const percent = parsePercent(percentText);
	if (percent === undefined) {
		return { kind: "error", reason: "invalid-percent", line };
	}

	const totalBytes =
		groups.total !== undefined
			? parseSize(groups.total, groups.totalUnit)
			: undefined;
	const speedBps =
		groups.speed !== undefined
			? parseSpeed(groups.speed, groups.speedUnit)
			: undefined;
	const etaSec = groups.eta !== undefined ? parseClock(groups.eta) : undefined;

	const event: ProgressEvent = { percent };
	if (totalBytes !== undefined) {
		event.totalBytes = totalBytes;
		event.downloadedBytes = Math.floor((totalBytes * percent) / 100);
	}
	if (speedBps !== undefined) {
		event.speedBps = speedBps;
	}
	if (etaSec !== undefined) {
		event.etaSec = etaSec;
	}

	return { kind: "event", event };
}

function parsePercent(value: string): number | undefined {
	if (!/^\d+(?:\.\d+)?$/.test(value)) {
		return undefined;
	}

	const percent = Number(value);
	if (!Number.isFinite(percent) || percent > 100) {
		return undefined;
	}

	return percent;
}

function unitMultiplier(unit?: string): number {
	return (unit && UNIT_MULTIPLIERS.get(unit)) || 1;
}

/**
 * Converts a magnitude and a binary unit to whole bytes. Units other than
 * KiB, MiB and GiB count as plain bytes.
 */
export function parseSize(value: string, unit?: string): number | undefined {
	const magnitude = Number(value);
	if (!Number.isFinite(magnitude)) {
		return undefined;
	}

	return Math.trunc(magnitude * unitMultiplier(unit));
}

function parseSpeed(value: string, unit?: string): number | undefined {
	const magnitude = Number(value);
	if (!Number.isFinite(magnitude)) {
		return undefined;
	}

	return magnitude * unitMultiplier(unit);
}

/**
 * Parses `minutes:seconds`. Any other shape, including `hh:mm:ss` and
 * "Unknown", yields undefined.
 */
export function parseClock(value: string): number | undefined {
	const parts = value.split(":");
	if (parts.length !== 2) {
		return undefined;
	}

	const [minutes, seconds] = parts;
	if (
		minutes === undefined ||
		seconds === undefined ||
		!/^\d+$/.test(minutes) ||
		!/^\d+$/.test(seconds)
	) {
		return undefined;
	}

	return Number(minutes) * 60 + Number(seconds);
}
