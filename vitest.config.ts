// vitest.config.ts — Unit and route tests (no network, no engine process)
import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    testTimeout: 10_000,
  },
})
