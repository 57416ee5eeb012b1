import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts", "src/cli.ts"],
  format: ["esm"],
  sourcemap: true,
  clean: true,
  treeshake: true,
  target: "node20",
  noExternal: [/^@provisioner\//],
});
