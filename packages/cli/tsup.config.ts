/**
 * @summary Build configuration for @coinlab/cli package using tsup.
 *
 * Produces a single ESM executable with the workspace packages bundled in;
 * the template directory ships beside it.
 */

import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  sourcemap: true,
  splitting: false,
  treeshake: true,
  minify: false,
  target: "es2022",
  outDir: "dist",
  banner: {
    js: "#!/usr/bin/env node",
  },
  noExternal: [/^@coinlab\//],
  external: ["commander", "chalk", "vitest"],
});
