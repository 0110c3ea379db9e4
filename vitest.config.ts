// PURITY: SHELL (configuration only)
// INVARIANT: ∀ test: runs in a fresh node environment, mocks restored afterwards

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		// Tests import describe/it/expect explicitly from "vitest"
		globals: false,
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CORE stays fully covered; SHELL is exercised through fakes
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**/*.ts"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 90,
					functions: 100,
					lines: 95,
					statements: 95,
				},
			},
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
