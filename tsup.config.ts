import { defineConfig } from "tsup";
import { CODEC_WORKER_ENTRY } from "./src/codec/interfaces";

export default defineConfig({
  // Named entries keep both bundles at the top of dist/: WorkerCodecRunner
  // loads the worker by URL relative to index.js.
  entry: {
    index: "src/index.ts",
    [CODEC_WORKER_ENTRY]: "src/codec/codec-worker.ts",
  },
  clean: true,
  dts: {
    resolve: true,
    entry: "src/index.ts",
  },
  format: ["esm"],
  sourcemap: true,
  target: "es2022",
  platform: "node",
  splitting: false,
  treeshake: true,
  minify: false, // Keep readable for debugging
  external: ["@noble/hashes", "jose"],
  outExtension({ format }) {
    return {
      js: format === "esm" ? ".js" : ".cjs",
    };
  },
});
