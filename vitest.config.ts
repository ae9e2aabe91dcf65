import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["shared-utils/tests/**/*.test.ts", "marketplace/tests/**/*.test.ts"],
    restoreMocks: true,
  },
});
