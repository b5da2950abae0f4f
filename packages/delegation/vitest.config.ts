import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "delegation",
    include: ["tests/**/*.test.ts"],
  },
});
