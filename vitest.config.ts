import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["packages/*/tests/**/*.test.ts"],
		// Shape cache reclamation tests call gc() directly.
		pool: "forks",
		poolOptions: {
			forks: {
				execArgv: ["--expose-gc"],
			},
		},
	},
});
