import { defineConfig, type Options } from "tsup";

interface BundleOptions {
  dev?: boolean;
}

function options({ dev }: BundleOptions): Options {
  return {
    entry: {
      [dev ? "dev" : "prod"]: "src/index.ts"
    },
    outDir: "dist/bundle",
    treeshake: true,
    bundle: true,
    format: "esm",
    platform: "node",
    target: "node20",
    define: {
      __DEV__: dev ? "true" : "false"
    },
    esbuildOptions(opts) {
      opts.mangleProps = !dev ? /^_/ : undefined;
    }
  };
}

export default defineConfig([
  options({ dev: true }), // dev
  options({ dev: false }) // prod
]);
