import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["npm/*/tests/**/*.test.ts"],
    environment: "node",
  },
});
