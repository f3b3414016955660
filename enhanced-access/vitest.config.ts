import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: [
      "src/**/*.test.ts", // Co-located unit tests
      "tests/integration/**/*.spec.ts", // Integration tests
    ],
  },
});
