import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    include: ["./test/**/*.test.ts"],
    globals: true,
    // Process manager tests fork real worker processes
    pool: "forks",
    poolOptions: {
      forks: {
        isolate: true
      }
    },
    testTimeout: 60000,
    hookTimeout: 30000
  }
})
