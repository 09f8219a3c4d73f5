import { defineConfig } from "vitest/config"

export default defineConfig({
	test: {
		environment: "node",
		include: ["packages/*/tests/**/*.test.ts"],
		setupFiles: ["packages/cli/tests/preload.ts"],
		restoreMocks: true,
		clearMocks: true,
	},
})
