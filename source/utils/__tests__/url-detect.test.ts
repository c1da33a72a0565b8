import { describe, expect, it } from "vitest";
import { InvalidInputError } from "../../core/errors.js";
import { looksLikePlaylist, parseHttpUrl } from "../url-detect.js";

describe("parseHttpUrl", () => {
	it("accepts http and https URLs", () => {
		expect(parseHttpUrl(" https://www.youtube.com/watch?v=abc ").href).toBe(
			"https://www.youtube.com/watch?v=abc",
		);
	});

	it("rejects other schemes and garbage", () => {
		expect(() => parseHttpUrl("ftp://example.com/file")).toThrow(
			"Unsupported URL scheme: ftp:. Use http/https.",
		);
		expect(() => parseHttpUrl("not a url")).toThrow(InvalidInputError);
	});
});

describe("looksLikePlaylist", () => {
	it("detects list parameters and playlist paths", () => {
		expect(looksLikePlaylist(new URL("https://www.youtube.com/playlist?list=PL1"))).toBe(true);
		expect(looksLikePlaylist(new URL("https://www.youtube.com/watch?v=a&list=PL1"))).toBe(true);
		expect(looksLikePlaylist(new URL("https://www.youtube.com/watch?v=a"))).toBe(false);
	});
});
