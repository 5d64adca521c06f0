import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/server.ts"],
  format: ["esm"],
  dts: false,
  clean: true,
  sourcemap: true,
  // Workspace packages ship TypeScript sources
  noExternal: ["@phpscope/core"],
  external: ["tree-sitter", "tree-sitter-php"],
});
