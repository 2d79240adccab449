import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["rag-server/src/**/*.test.ts", "rag-client/src/**/*.test.ts"],
    testTimeout: 20000,
  },
});
