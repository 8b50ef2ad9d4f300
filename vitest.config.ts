import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		conditions: ["development"],
	},
	test: {
		include: ["packages/*/tests/**/*.test.ts", "src/test/**/*.test.ts"],
		environment: "node",
	},
});
