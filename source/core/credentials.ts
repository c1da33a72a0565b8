import { access } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "../utils/logger.js";
import { UnsupportedBrowserError } from "./errors.js";
import type { BrowserName } from "./types.js";

export const SUPPORTED_BROWSERS: readonly BrowserName[] = [
	"chrome",
	"firefox",
	"edge",
	"brave",
	"opera",
];

export type CookieStoreProbe =
	| { found: true; path: string }
	| { found: false; reason: string };

export type ProbeOptions = {
	platform?: NodeJS.Platform;
	env?: NodeJS.ProcessEnv;
	logger?: Pick<Logger, "warn">;
};

/**
 * Resolves a user-supplied browser name to the token yt-dlp expects after
 * `--cookies-from-browser`.
 */
export function resolveBrowser(name: string): BrowserName {
	const normalized = name.trim().toLowerCase();
	const browser = SUPPORTED_BROWSERS.find(
		(candidate) => candidate === normalized,
	);
	if (!browser) {
		throw new UnsupportedBrowserError(name);
	}

	return browser;
}

/**
 * Computes where the browser keeps its cookie database on this platform.
 * Firefox points at the profiles directory since profile names are random.
 */
export function cookieStorePath(
	browser: BrowserName,
	platform: NodeJS.Platform,
	env: NodeJS.ProcessEnv,
): string {
	if (platform === "win32") {
		return windowsCookieStorePath(browser, env);
	}

	if (platform === "darwin") {
		const home = requireEnv(env, "HOME");
		const support = path.posix.join(home, "Library/Application Support");
		switch (browser) {
			case "chrome":
				return path.posix.join(support, "Google/Chrome/Default/Cookies");
			case "firefox":
				return path.posix.join(support, "Firefox/Profiles");
			case "edge":
				return path.posix.join(support, "Microsoft Edge/Default/Cookies");
			case "brave":
				return path.posix.join(
					support,
					"BraveSoftware/Brave-Browser/Default/Cookies",
				);
			case "opera":
				return path.posix.join(support, "com.operasoftware.Opera/Cookies");
		}
	}

	if (platform === "linux") {
		const home = requireEnv(env, "HOME");
		const configHome = env.XDG_CONFIG_HOME || path.posix.join(home, ".config");
		switch (browser) {
			case "chrome":
				return path.posix.join(configHome, "google-chrome/Default/Cookies");
			case "firefox":
				return path.posix.join(home, ".mozilla/firefox");
			case "edge":
				return path.posix.join(configHome, "microsoft-edge/Default/Cookies");
			case "brave":
				return path.posix.join(
					configHome,
					"BraveSoftware/Brave-Browser/Default/Cookies",
				);
			case "opera":
				return path.posix.join(configHome, "opera/Cookies");
		}
	}

	throw new Error(`cookie detection is not supported on ${platform}`);
}

function windowsCookieStorePath(
	browser: BrowserName,
	env: NodeJS.ProcessEnv,
): string {
	if (browser === "firefox") {
		return path.win32.join(
			requireEnv(env, "APPDATA"),
			"Mozilla\\Firefox\\Profiles",
		);
	}

	const localAppData = requireEnv(env, "LOCALAPPDATA");
	switch (browser) {
		case "chrome":
			return path.win32.join(
				localAppData,
				"Google\\Chrome\\User Data\\Default\\Network\\Cookies",
			);
		case "edge":
			return path.win32.join(
				localAppData,
				"Microsoft\\Edge\\User Data\\Default\\Network\\Cookies",
			);
		case "brave":
			return path.win32.join(
				localAppData,
				"BraveSoftware\\Brave-Browser\\User Data\\Default\\Network\\Cookies",
			);
		case "opera":
			return path.win32.join(
				localAppData.replace("Local", "Roaming"),
				"Opera Software\\Opera Stable\\Network\\Cookies",
			);
	}
}

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
	const value = env[name];
	if (!value) {
		throw new Error(`${name} is not set`);
	}

	return value;
}

/**
 * Best-effort check that the browser's cookie store exists. Never throws:
 * yt-dlp is still told to use the browser, it may find cookies elsewhere.
 */
export async function locateCookieStore(
	browser: BrowserName,
	options: ProbeOptions = {},
): Promise<CookieStoreProbe> {
	const platform = options.platform ?? process.platform;
	const env = options.env ?? process.env;

	let storePath: string;
	try {
		storePath = cookieStorePath(browser, platform, env);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		options.logger?.warn(`could not locate ${browser} cookies: ${reason}`);
		return { found: false, reason };
	}

	try {
		await access(storePath);
		return { found: true, path: storePath };
	} catch {
		const reason = `no cookie store at ${storePath}`;
		options.logger?.warn(
			`${browser} cookies not found (${storePath}). Only public videos may be downloadable; make sure you are signed in with ${browser}.`,
		);
		return { found: false, reason };
	}
}
