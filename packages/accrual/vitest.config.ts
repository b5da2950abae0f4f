import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "accrual",
    include: ["tests/**/*.test.ts"],
  },
});
