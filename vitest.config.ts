import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["analytics/**/*.test.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["analytics/**/*.ts"],
			exclude: ["analytics/**/*.test.ts", "analytics/run-pipeline.ts"],
		},
	},
});
