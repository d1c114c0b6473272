// pattern: Imperative Shell
import { defineConfig, mergeConfig } from "vitest/config";

import workspaceConfig from "../../vitest.config.js";

export default mergeConfig(
  workspaceConfig,
  defineConfig({
    test: {
      silent: "passed-only",
      // Unit tests for this package only
      include: ["src/**/*.{test,spec}.ts"],
      exclude: ["node_modules", "dist"],
    },
  })
);
