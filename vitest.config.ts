import { defineConfig } from "vitest/config"

export default defineConfig({
  esbuild: {
    jsx: "automatic",
  },
  test: {
    include: ["packages/*/src/**/*.test.{ts,tsx}"],
    globals: true,
    setupFiles: ["./test-setup.ts"],
  },
})
