// CHANGE: Vitest configuration for the adapter's unit tests
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution without side effects

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // Tests import { describe, it, expect } from "vitest"
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
		},

		// Clear mocks between tests so spies on console never leak
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
