import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		environment: "node",
		include: ["src/tests/**/*.test.ts"],
		exclude: ["node_modules", "dist"],
	},
	resolve: {
		alias: {
			"@core": fileURLToPath(new URL("./src/core", import.meta.url)),
		},
	},
});
