import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/cli.ts"],
  format: ["esm"],
  platform: "node",
  dts: false,
  sourcemap: true,
  clean: true,
  target: "node20",
  treeshake: true
});
