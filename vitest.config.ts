import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/**/*.test.ts"],
		exclude: ["**/node_modules/**", "**/dist/**"],
		pool: "forks",
		poolOptions: {
			forks: {
				singleFork: true,
			},
		},
		// Log level and process.env are process-wide; keep tests in a file sequential
		sequence: {
			concurrent: false,
		},
		coverage: {
			provider: "v8",
			reporter: ["text", "html"],
			include: ["packages/*/src/**/*.ts"],
			exclude: ["**/__tests__/**", "**/index.ts", "packages/agent/src/cli.ts"],
		},
		testTimeout: 10000,
		hookTimeout: 10000,
	},
});
