import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@rtl433-bridge/common": path.resolve(__dirname, "packages/common/src/index.ts")
		}
	},
	test: {
		include: ["packages/*/src/**/*.test.ts", "receiver/src/**/*.test.ts"],
		environment: "node",
		restoreMocks: true
	}
});
