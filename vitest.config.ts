import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const resolve = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
	test: {
		watch: false,
		fileParallelism: true,
		include: ["tests/**/*.test.ts"],
		exclude: ["node_modules"],
		setupFiles: ["./tests/setup.ts"],
	},
	resolve: {
		alias: {
			"@harnesslink/provider-redis": resolve("./packages/provider-redis/src"),
			"@harnesslink/provider-pg": resolve("./packages/provider-pg/src"),
			"@harnesslink/provider-kafka": resolve("./packages/provider-kafka/src"),
			harnesslink: resolve("./packages/core/src"),
		},
	},
});
