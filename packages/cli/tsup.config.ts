import { defineConfig } from "tsup"

export default defineConfig({
	entry: ["src/index.ts"],
	format: ["esm"],
	target: "node20",
	outDir: "dist",
	clean: true,
	splitting: false,
	sourcemap: false,
	dts: false,
	// Bundle @blueprint-forge/core into the output
	noExternal: [/@blueprint-forge\//],
	// Keep all npm dependencies external (installed by users)
	external: ["@anthropic-ai/sdk", "commander", "yaml", "zod"],
	banner: {
		js: "#!/usr/bin/env node",
	},
})
