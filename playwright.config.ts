import { defineConfig } from "@playwright/test";

// API tests only: suites start their own server on an ephemeral port and use
// the `request` fixture, so no browser project is configured.
export default defineConfig({
  testDir: "./tests",
  testMatch: "**/*.test.ts",
  fullyParallel: false,
  forbidOnly: !!process.env.CI,
  retries: 0,
});
