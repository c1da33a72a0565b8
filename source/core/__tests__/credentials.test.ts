import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
	cookieStorePath,
	locateCookieStore,
	resolveBrowser,
} from "../credentials.js";
import { UnsupportedBrowserError } from "../errors.js";

describe("resolveBrowser", () => {
	it("normalises supported browser names", () => {
		expect(resolveBrowser("chrome")).toBe("chrome");
		expect(resolveBrowser("FIREFOX")).toBe("firefox");
		expect(resolveBrowser(" Brave ")).toBe("brave");
	});

	it("rejects anything else", () => {
		expect(() => resolveBrowser("safari")).toThrow(UnsupportedBrowserError);
	});
});

describe("cookieStorePath", () => {
	it("uses LOCALAPPDATA and APPDATA on Windows", () => {
		const env = {
			LOCALAPPDATA: "C:\\Users\\me\\AppData\\Local",
			APPDATA: "C:\\Users\\me\\AppData\\Roaming",
		};
		expect(cookieStorePath("chrome", "win32", env)).toBe(
			"C:\\Users\\me\\AppData\\Local\\Google\\Chrome\\User Data\\Default\\Network\\Cookies",
		);
		expect(cookieStorePath("firefox", "win32", env)).toBe(
			"C:\\Users\\me\\AppData\\Roaming\\Mozilla\\Firefox\\Profiles",
		);
		expect(cookieStorePath("opera", "win32", env)).toBe(
			"C:\\Users\\me\\AppData\\Roaming\\Opera Software\\Opera Stable\\Network\\Cookies",
		);
	});

	it("uses Application Support on macOS", () => {
		expect(cookieStorePath("edge", "darwin", { HOME: "/Users/me" })).toBe(
			"/Users/me/Library/Application Support/Microsoft Edge/Default/Cookies",
		);
	});

	it("uses XDG config directories on Linux", () => {
		expect(cookieStorePath("chrome", "linux", { HOME: "/home/me" })).toBe(
			"/home/me/.config/google-chrome/Default/Cookies",
		);
		expect(
			cookieStorePath("brave", "linux", {
				HOME: "/home/me",
				XDG_CONFIG_HOME: "/cfg",
			}),
		).toBe("/cfg/BraveSoftware/Brave-Browser/Default/Cookies");
		expect(cookieStorePath("firefox", "linux", { HOME: "/home/me" })).toBe(
			"/home/me/.mozilla/firefox",
		);
	});

	it("fails when the root environment variable is missing", () => {
		expect(() => cookieStorePath("chrome", "win32", {})).toThrow(
			"LOCALAPPDATA is not set",
		);
	});
});

describe("locateCookieStore", () => {
	let home: string;

	beforeEach(async () => {
		home = await mkdtemp(path.join(tmpdir(), "tubebatch-cookies-"));
	});

	afterEach(async () => {
		await rm(home, { recursive: true, force: true });
	});

	it("finds an existing cookie database", async () => {
		const dir = path.join(home, ".config/google-chrome/Default");
		await mkdir(dir, { recursive: true });
		await writeFile(path.join(dir, "Cookies"), "");
		const logger = { warn: vi.fn() };

		const probe = await locateCookieStore("chrome", {
			platform: "linux",
			env: { HOME: home },
			logger,
		});

		expect(probe).toEqual({ found: true, path: path.join(dir, "Cookies") });
		expect(logger.warn).not.toHaveBeenCalled();
	});

	it("warns without failing when the database is absent", async () => {
		const logger = { warn: vi.fn() };

		const probe = await locateCookieStore("opera", {
			platform: "linux",
			env: { HOME: home },
			logger,
		});

		expect(probe).toEqual({
			found: false,
			reason: `no cookie store at ${home}/.config/opera/Cookies`,
		});
		expect(logger.warn).toHaveBeenCalledTimes(1);
	});

	it("warns when the platform is not supported", async () => {
		const logger = { warn: vi.fn() };

		const probe = await locateCookieStore("chrome", {
			platform: "aix",
			env: { HOME: home },
			logger,
		});

		expect(probe).toEqual({
			found: false,
			reason: "cookie detection is not supported on aix",
		});
		expect(logger.warn).toHaveBeenCalledWith(
			"could not locate chrome cookies: cookie detection is not supported on aix",
		);
	});
});
