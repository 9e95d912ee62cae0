import { defineConfig, mergeConfig } from "vitest/config";
import viteConfig from "./vite.config.js";

export default mergeConfig(
  viteConfig,
  defineConfig({
    test: {
      include: ["packages/*/src/**/*.test.ts", "apps/*/src/**/*.test.ts"],
      pool: "threads",
    },
  }),
);
