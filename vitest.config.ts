import { defineConfig } from "vitest/config";

// Workspace packages resolve to their TypeScript sources
const conditions = ["source"];

export default defineConfig({
  resolve: { conditions },
  ssr: { resolve: { conditions } },
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node",
    testTimeout: 10_000,
  },
});
