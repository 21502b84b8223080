import { defineConfig } from "vitest/config";
import { fileURLToPath } from "url";

export default defineConfig({
	test: {
		name: "plugin-host",
		environment: "node",
		include: ["src/__tests__/**/*.test.ts"],
	},
	resolve: {
		alias: {
			"@scriptplug/plugin-runner-core": fileURLToPath(new URL("../plugin-runner-core/src/index.ts", import.meta.url)),
		},
	},
});
