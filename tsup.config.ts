import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/core/index.ts", "src/cli.ts"],
  format: ["esm"],
  dts: { entry: "src/core/index.ts" },
  outDir: "dist",
  clean: true,
  splitting: false,
  sourcemap: true,
});
