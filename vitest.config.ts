// CHANGE: Vitest configuration for the linter engine
// WHY: Native ESM test runs over the TypeScript sources, no build step first
// PURITY: SHELL (configuration only)
// INVARIANT: Deterministic test execution; tests share no state except the class-level registry, which each suite restores
// COMPLEXITY: O(n) test execution where n = |test_files|

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // IMPORTANT: Use explicit imports for type safety
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: Coverage threshold for CORE
		// WHY: The suppression engine and orchestrator decide what users see and how the command exits
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**/*.ts"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 90,
					functions: 90,
					lines: 90,
					statements: 90,
				},
			},
		},

		// CHANGE: Clear mocks between tests
		// WHY: Prevent test contamination, ensure test independence
		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
