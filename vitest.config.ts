import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@dvara/core": fileURLToPath(new URL("./packages/core/src/index.ts", import.meta.url)),
			"@dvara/client": fileURLToPath(new URL("./packages/client/src/index.ts", import.meta.url)),
		},
	},
	test: {
		include: ["packages/*/test/**/*.test.ts"],
		setupFiles: ["./vitest.setup.ts"],
		testTimeout: 10_000,
	},
});
