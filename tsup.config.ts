// tsup.config.ts
import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/bin.ts"],
  format: ["esm", "cjs"],
  sourcemap: true,
  dts: { entry: "src/index.ts" },
  clean: true,
  treeshake: true,
  minify: false,
  target: "node20",
  outDir: "dist",
});
