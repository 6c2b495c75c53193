import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const source = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@edge-uplink/streaming": source("./packages/streaming/src/index.ts"),
			"@edge-uplink/uploader": source("./packages/uploader/src/index.ts"),
		},
	},
	test: {
		environment: "node",
		include: ["packages/*/src/tests/**/*.test.ts"],
		testTimeout: 10_000,
	},
});
