import { defineConfig } from "tsup";

// Single-file bundles of the bot and the command deploy script, for hosts without a build step.
export default defineConfig({
  entry: {
    bot: "src/index.ts",
    commands: "scripts/commands.ts",
  },
  format: ["esm"],
  target: "node20",
  platform: "node",
  outDir: "dist/bundle",
  splitting: false,
  sourcemap: true,
  clean: true,
  // Native addon; loaded from node_modules at run time
  external: ["better-sqlite3"],
});
