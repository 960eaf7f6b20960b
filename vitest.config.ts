import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["harvest/**/*.test.ts"],
    environment: "node",
  },
});
