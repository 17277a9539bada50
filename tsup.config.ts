import { defineConfig } from "tsup";

export default defineConfig({
  entry:    { index: "src/index.ts" },
  format:   ["esm", "cjs"],
  dts:      true,
  clean:    true,
  // pino writes through Node streams, so the bundle targets Node only.
  platform: "node",
  target:   "node20",
});
