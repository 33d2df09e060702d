import { defineConfig } from "tsup";

export default defineConfig([
  // Library build (ESM)
  {
    entry: ["src/index.ts"],
    format: ["esm"],
    dts: false,
    splitting: false,
    sourcemap: false,
    clean: true,
    target: "node20",
    platform: "node",
  },
  // CLI build
  {
    entry: { lesswright: "bin/lesswright.ts" },
    format: ["esm"],
    dts: false,
    splitting: false,
    sourcemap: false,
    clean: false,
    target: "node20",
    platform: "node",
  },
]);
