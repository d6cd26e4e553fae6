import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["index.test.ts", "src/**/*.test.ts"],
    exclude: ["node_modules/**"],
  },
});
