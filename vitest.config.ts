import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["source/**/__tests__/**/*.test.ts"],
	},
});
