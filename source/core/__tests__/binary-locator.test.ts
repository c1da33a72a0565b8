import { chmod, mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	YT_DLP_ENV_VAR,
	executableNames,
	locateExecutable,
	probeVersion,
} from "../binary-locator.js";
import { DependencyError, ProcessLaunchError } from "../errors.js";
import { fakeSpawn } from "./fake-child.js";

describe("locateExecutable", () => {
	let root: string;
	let binDir: string;

	beforeEach(async () => {
		root = await mkdtemp(path.join(tmpdir(), "tubebatch-bin-"));
		binDir = path.join(root, "bin");
		await mkdir(binDir);
	});

	afterEach(async () => {
		await rm(root, { recursive: true, force: true });
	});

	async function installFake(dir: string): Promise<string> {
		const file = path.join(dir, "yt-dlp");
		await writeFile(file, "#!/bin/sh\n");
		await chmod(file, 0o755);
		return file;
	}

	it("searches PATH entries in order", async () => {
		const installed = await installFake(binDir);
		const env = { PATH: [path.join(root, "missing"), binDir].join(path.delimiter) };

		await expect(locateExecutable({ env, platform: "linux" })).resolves.toBe(installed);
	});

	it("prefers an explicit path over the environment", async () => {
		const installed = await installFake(binDir);

		await expect(
			locateExecutable({
				explicit: installed,
				env: { [YT_DLP_ENV_VAR]: "/nowhere/yt-dlp", PATH: "" },
			}),
		).resolves.toBe(installed);
	});

	it("uses the environment override when no explicit path is given", async () => {
		const installed = await installFake(binDir);

		await expect(
			locateExecutable({ env: { [YT_DLP_ENV_VAR]: installed } }),
		).resolves.toBe(installed);
	});

	it("fails with a dependency error when nothing is found", async () => {
		await expect(
			locateExecutable({ env: { PATH: binDir }, platform: "linux" }),
		).rejects.toThrow(
			new DependencyError(
				"yt-dlp was not found on PATH. Install it (pip install yt-dlp) or pass --yt-dlp <path>.",
			),
		);
		await expect(
			locateExecutable({ explicit: path.join(root, "nope") }),
		).rejects.toBeInstanceOf(DependencyError);
	});
});

describe("executableNames", () => {
	it("only considers names that spawn without a shell", () => {
		expect(executableNames("yt-dlp", "win32")).toEqual(["yt-dlp.exe", "yt-dlp"]);
		expect(executableNames("yt-dlp", "darwin")).toEqual(["yt-dlp"]);
	});
});

describe("probeVersion", () => {
	it("returns the trimmed version", async () => {
		const spawn = fakeSpawn({ stdout: ["2024.08.06\n"] });
		await expect(probeVersion("yt-dlp", spawn)).resolves.toBe("2024.08.06");
		expect(spawn).toHaveBeenCalledWith("yt-dlp", ["--version"], expect.anything());
	});

	it("keeps launch failures distinct", async () => {
		const spawn = fakeSpawn({ launchError: new Error("spawn yt-dlp EACCES") });
		await expect(probeVersion("yt-dlp", spawn)).rejects.toBeInstanceOf(ProcessLaunchError);
	});

	it("wraps a failing version call", async () => {
		const spawn = fakeSpawn({ stderr: ["boom\n"], exitCode: 1 });
		await expect(probeVersion("yt-dlp", spawn)).rejects.toThrow(
			"yt-dlp --version failed: yt-dlp failed with exit code 1.",
		);
	});
});
