import { InvalidInputError } from "./errors.js";
import type { QualityPreset } from "./types.js";

type QualityPolicy = {
	formatSelector: string;
	extractAudio: boolean;
	description: string;
};

const QUALITY_POLICIES: Record<QualityPreset, QualityPolicy> = {
	"max-video": {
		formatSelector: "bestvideo+bestaudio/best",
		extractAudio: false,
		description: "Best video and audio (up to 4K)",
	},
	"max-audio": {
		formatSelector: "bestaudio",
		extractAudio: true,
		description: "Best audio only, converted to MP3",
	},
	"min-video": {
		formatSelector: "worstvideo+worstaudio/worst",
		extractAudio: false,
		description: "Lowest video quality, for previews",
	},
	"min-size": {
		formatSelector: "worst[ext=mp4]",
		extractAudio: false,
		description: "Smallest file size",
	},
};

export const QUALITY_PRESETS: readonly QualityPreset[] = [
	"max-video",
	"max-audio",
	"min-video",
	"min-size",
];

export function toFormatSelector(quality: QualityPreset): string {
	return QUALITY_POLICIES[quality].formatSelector;
}

export function needsAudioExtraction(quality: QualityPreset): boolean {
	return QUALITY_POLICIES[quality].extractAudio;
}

export function describeQuality(quality: QualityPreset): string {
	return QUALITY_POLICIES[quality].description;
}

export function isQualityPreset(value: string): value is QualityPreset {
	return Object.hasOwn(QUALITY_POLICIES, value);
}

export function parseQualityPreset(value: string): QualityPreset {
	const normalized = value.trim().toLowerCase();
	if (!isQualityPreset(normalized)) {
		throw new InvalidInputError(
			`Unknown quality "${value}". Use one of: ${QUALITY_PRESETS.join(", ")}.`,
		);
	}

	return normalized;
}
