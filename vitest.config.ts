import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
	test: {
		include: ["packages/**/*.test.ts", "apps/**/*.test.ts"],
		coverage: {
			include: ["packages/**/*.ts", "apps/**/*.ts"],
		},
	},
	resolve: {
		alias: {
			"@socket-ramp/core": path.resolve(__dirname, "./packages/core/src/index.ts"),
		},
	},
});
