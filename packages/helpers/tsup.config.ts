import { defineConfig } from "tsup";

export default defineConfig({
  format: ["esm"],
  entry: { index: "src/index.ts" },
  dts: true,
  sourcemap: true,
  clean: true,
  target: "es2022",
});
