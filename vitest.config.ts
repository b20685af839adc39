import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

export default defineConfig({
	resolve: {
		alias: {
			"@": fileURLToPath(new URL("./packages/depot", import.meta.url)),
		},
	},
	test: {
		coverage: {
			exclude: ["**/node_modules/**", "**/*.test.ts", "**/tests/**", "**/testing/**"],
			include: ["packages/**/*.ts"],
			provider: "v8",
		},
		environment: "node",
		exclude: ["**/node_modules/**", "**/dist/**"],
		globals: false,
		include: ["packages/**/*.test.ts"],
		setupFiles: ["./packages/depot/tests/helpers/assertions.ts"],
	},
})
