import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["regenctl/test/**/*.test.ts"],
    exclude: ["**/node_modules/**", "**/dist/**"],
  },
});
