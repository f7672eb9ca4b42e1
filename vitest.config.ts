import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		include: ["packages/*/tests/**/*.test.ts"],
		environment: "node",
		setupFiles: ["packages/cli/tests/preload.ts"],
		restoreMocks: true,
	},
})
