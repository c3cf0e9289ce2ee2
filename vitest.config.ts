import tsconfigPaths from "vite-tsconfig-paths";
import { defineConfig } from "vitest/config";

export default defineConfig({
	plugins: [tsconfigPaths()],
	test: {
		globals: true,
		environment: "node",
		include: ["tests/**/*.spec.ts"],
		coverage: {
			provider: "v8",
			include: ["src/lib/**/*.ts"],
		},
	},
});
