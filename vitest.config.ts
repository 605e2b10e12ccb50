import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    pool: "forks",
    include: ["tests/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    env: {
      LOG_LEVEL: "silent",
      SOURCE_HOST_MARKER: "tiktok.com",
      PASTE_URL: "https://paste.rs",
    },
    testTimeout: 10000,
    reporters: ["default"],
  },
});
