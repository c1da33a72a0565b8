import type { FailureReason, ProcessOutcome } from "./types.js";

// Matched verbatim against yt-dlp's English stderr. If yt-dlp rewords these
// messages, this is the only place to update.
export const BOT_CHALLENGE_SIGNATURE = "Sign in to confirm you're not a bot";
export const COOKIE_LOCKED_SIGNATURE = "Could not copy Chrome cookie database";

export function classifyOutcome(
	exitCode: number | null,
	signal: NodeJS.Signals | null,
	diagnostic: string,
): ProcessOutcome {
	if (exitCode === 0) {
		return { kind: "success" };
	}

	return { kind: "failure", reason: classifyFailure(exitCode, signal, diagnostic) };
}

function classifyFailure(
	exitCode: number | null,
	signal: NodeJS.Signals | null,
	diagnostic: string,
): FailureReason {
	if (diagnostic.includes(BOT_CHALLENGE_SIGNATURE)) {
		return { kind: "bot-challenge" };
	}

	if (diagnostic.includes(COOKIE_LOCKED_SIGNATURE)) {
		return { kind: "cookie-locked" };
	}

	return {
		kind: "generic",
		exitCode,
		...(signal ? { signal } : {}),
		diagnostic,
	};
}

export type FailureDescription = {
	headline: string;
	remediation: string[];
};

export function describeFailure(reason: FailureReason): FailureDescription {
	switch (reason.kind) {
		case "bot-challenge":
			return {
				headline:
					"YouTube asked to confirm you're not a bot; browser cookies are required.",
				remediation: [
					"1. Open your browser and sign in to YouTube.",
					"2. Run tubebatch again with --cookies <browser>, for example --cookies chrome.",
					"Other browsers: --cookies firefox, --cookies edge, --cookies brave, --cookies opera.",
				],
			};
		case "cookie-locked":
			return {
				headline: "Could not copy the Chrome cookie database.",
				remediation: [
					"1. Quit Chrome completely, then run tubebatch again.",
					"2. If it still fails, end every Chrome process (background apps keep the file locked).",
					"3. Or read cookies from another browser: --cookies firefox or --cookies edge.",
				],
			};
		case "generic": {
			const status =
				reason.exitCode !== null
					? `exit code ${reason.exitCode}`
					: `signal ${reason.signal ?? "unknown"}`;
			const diagnostic = reason.diagnostic.trim();
			return {
				headline: `yt-dlp failed with ${status}.`,
				remediation: diagnostic ? diagnostic.split("\n") : [],
			};
		}
	}
}
