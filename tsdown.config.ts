import { defineConfig } from "tsdown";

export default defineConfig({
  entry: ["./src/index.ts", "./src/bin.ts"],
  platform: "node",
  format: "esm",
  fixedExtension: false,
  dts: true,
  sourcemap: true,
});
