import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["tests/**/*.test.ts"],
		exclude: ["**/node_modules/**", "**/dist/**", "benchmarks/**"],
		// Archive round trips touch the filesystem heavily.
		testTimeout: 30_000,
	},
});
