import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		name: "plugin-runner-core",
		environment: "node",
		include: ["src/__tests__/**/*.test.ts"],
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**"],
			exclude: ["**/__tests__/**", "**/*.test.ts"],
		},
	},
});
