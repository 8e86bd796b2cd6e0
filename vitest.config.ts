import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["test/**/*.test.ts"],
		// TTL cases wait for real expiry.
		testTimeout: 15_000,
		hookTimeout: 30_000,
	},
});
