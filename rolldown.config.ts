import { defineConfig } from "rolldown";

export default defineConfig([
  // ESM bundle (single file)
  {
    input: "src/index.ts",
    output: {
      file: "dist/dataflow-signals.esm.js",
      format: "esm",
      sourcemap: true,
    },
  },
  // Async helpers
  {
    input: "src/async.ts",
    output: {
      file: "dist/dataflow-signals-async.esm.js",
      format: "esm",
      sourcemap: true,
    },
  },
  // ESM bundle minified
  {
    input: "src/index.ts",
    output: {
      file: "dist/dataflow-signals.esm.min.js",
      format: "esm",
      sourcemap: true,
      minify: true,
    },
  },
]);
