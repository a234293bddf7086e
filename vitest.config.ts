// CHANGE: Vitest configuration for the node CLI
// INVARIANT: Deterministic test execution without side effects between tests

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // Tests import describe/it/expect from "vitest"
		environment: "node",
		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
			// CORE is pure and fully covered; SHELL/APP keep a low floor
			thresholds: {
				"src/core/**/*.ts": {
					branches: 100,
					functions: 100,
					lines: 100,
					statements: 100,
				},
				global: {
					branches: 10,
					functions: 10,
					lines: 10,
					statements: 10,
				},
			},
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
