import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/bin.ts"],
  format: ["esm"],
  platform: "node",
  target: "node20",
  clean: true,
  // Ship one file: the engine is a workspace package, not a published one.
  noExternal: ["@pagescope/engine"],
  banner: {
    js: [
      "import{createRequire as __cjs_createRequire}from'module';",
      "const require=__cjs_createRequire(import.meta.url);",
    ].join(""),
  },
});
