import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url))

export default defineConfig({
  resolve: {
    alias: {
      "@domain": fromRoot("./src/domain"),
      "@infra": fromRoot("./src/infra"),
      "@lib": fromRoot("./src/lib"),
      "@services": fromRoot("./src/services"),
    },
  },
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
  },
})
