import { defineConfig } from "tsup";

export default defineConfig([
  // CLI - bundle effect so the binary runs on its own
  {
    entry: {
      "cli/index": "src/cli/index.ts",
    },
    format: ["esm"],
    dts: false,
    sourcemap: true,
    clean: true,
    platform: "node",
    target: "node20",
    noExternal: [
      "effect",
      /^@effect\//,
    ],
    external: [
      /^@aws-sdk\//,
      "archiver",
      "esbuild",
    ],
    banner: {
      js: `import { createRequire } from 'module'; const require = createRequire(import.meta.url);`,
    },
  },
]);
