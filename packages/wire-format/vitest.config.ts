import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    name: "wire-format",
    include: ["src/**/*.test.ts"],
    setupFiles: ["./src/test-setup.ts"],
  },
})
