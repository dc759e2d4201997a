import { defineConfig } from "tsup";
import path from "path";
import fs from "fs";

const SRC = path.resolve(__dirname, "src");

/** Resolve `@/x` to `src/x.ts` or `src/x/index.ts`, matching the tsconfig paths. */
function resolveAlias(specifier: string): string {
  const abs = path.resolve(SRC, specifier.slice(2));

  if (fs.existsSync(abs) && fs.statSync(abs).isDirectory()) {
    return path.resolve(abs, "index.ts");
  }
  if (fs.existsSync(`${abs}.ts`)) {
    return `${abs}.ts`;
  }
  return abs;
}

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm", "cjs"],
  target: "node20",
  platform: "node",
  dts: true,
  clean: true,
  sourcemap: true,
  esbuildPlugins: [
    {
      name: "src-alias",
      setup(build) {
        build.onResolve({ filter: /^@\// }, (args) => ({ path: resolveAlias(args.path) }));
      },
    },
  ],
});
