import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "@ascent/core",
    environment: "node",
    include: [
      "tests/unit/**/*.test.ts",
      "tests/steps/**/*.steps.ts", // Gherkin step files
    ],
  },
});
