import { defineConfig } from "tsup";

export default defineConfig({
  entry: ["src/index.ts"],
  format: ["esm"],
  dts: true,
  sourcemap: true,
  clean: true,
  outDir: "./build",
  target: "es2022",
  splitting: false,
  treeshake: true,
  external: ["pino", "pino-pretty", "zod"],
});
