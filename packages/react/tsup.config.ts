import { defineConfig } from "tsup";

export default defineConfig({
	entry: {
		index: "src/index.ts",
	},
	format: ["cjs", "esm"],
	dts: true,
	clean: true,
	external: ["react", "react-dom", "@view-extract/core"],
});
