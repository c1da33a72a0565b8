import { mkdir, stat } from "node:fs/promises";
import path from "node:path";
import { InvalidInputError } from "../core/errors.js";

// mkdir -p; an existing directory is fine, an existing file is not.
export async function ensureOutputDir(outputDir: string): Promise<string> {
	const resolved = path.resolve(outputDir);
	const existing = await stat(resolved).catch(() => undefined);
	if (existing && !existing.isDirectory()) {
		throw new InvalidInputError(`Output path is not a directory: ${resolved}`);
	}

	await mkdir(resolved, { recursive: true });
	return resolved;
}
