import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
	test: {
		include: ["packages/**/src/**/*.test.ts", "apps/**/src/**/*.test.ts"],
		testTimeout: 15_000,
		coverage: {
			include: ["packages/**/src/**/*.ts", "apps/**/src/**/*.ts"],
		},
	},
	resolve: {
		alias: {
			"@filterbench/engine": path.resolve(__dirname, "./packages/engine/src/index.ts"),
		},
	},
});
