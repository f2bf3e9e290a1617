import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    name: "tlv",
    include: ["src/**/*.test.ts"],
    setupFiles: ["./src/test-setup.ts"],
  },
})
