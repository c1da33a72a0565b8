import { describe, expect, it, vi } from "vitest";
import { updateTool } from "../updater.js";

function fakeLogger() {
	return { info: vi.fn(), warn: vi.fn(), success: vi.fn() };
}

describe("updateTool", () => {
	it("stops after a successful pip upgrade", async () => {
		const run = vi.fn(async () => 0);
		const logger = fakeLogger();

		const result = await updateTool({ executable: "/usr/bin/yt-dlp", run, logger });

		expect(result).toEqual({ updated: true, via: "pip" });
		expect(run).toHaveBeenCalledTimes(1);
		expect(run).toHaveBeenCalledWith("pip", ["install", "--upgrade", "yt-dlp"]);
	});

	it("falls back to yt-dlp --update when pip fails", async () => {
		const run = vi
			.fn<(command: string, args: string[]) => Promise<number>>()
			.mockRejectedValueOnce(new Error("spawn pip ENOENT"))
			.mockResolvedValueOnce(0);
		const logger = fakeLogger();

		const result = await updateTool({ executable: "/usr/bin/yt-dlp", run, logger });

		expect(result).toEqual({ updated: true, via: "yt-dlp --update" });
		expect(run).toHaveBeenLastCalledWith("/usr/bin/yt-dlp", ["--update"]);
		expect(logger.warn).toHaveBeenCalledWith("pip update failed: spawn pip ENOENT");
	});

	it("never fails when both mechanisms fail", async () => {
		const run = vi.fn(async () => 1);
		const logger = fakeLogger();

		await expect(
			updateTool({ executable: "yt-dlp", run, logger }),
		).resolves.toEqual({ updated: false });
		expect(run).toHaveBeenCalledTimes(2);
		expect(logger.warn).toHaveBeenCalledWith(
			"skipped the yt-dlp update; you may need to update it manually.",
		);
		expect(logger.success).not.toHaveBeenCalled();
	});
});
