// pattern: Imperative Shell
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",

    include: ["packages/**/src/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],

    testTimeout: 10000,
    hookTimeout: 10000,

    globals: false,
    // Tests stub fetch; keep them from leaking into each other
    unstubGlobals: true,
  },
});
