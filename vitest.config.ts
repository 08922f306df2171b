import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string): string => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@toroid/core": pkg("core"),
			"@toroid/mesh": pkg("mesh"),
			"@toroid/life": pkg("life"),
			"@toroid/cli": pkg("cli"),
		},
	},
	test: {
		include: ["packages/*/test/**/*.test.ts"],
		setupFiles: ["./vitest.setup.ts"],
		environment: "node",
		testTimeout: 20_000,
	},
});
