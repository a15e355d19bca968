import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

const fromRoot = (relative: string) => fileURLToPath(new URL(relative, import.meta.url))

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@core$/, replacement: fromRoot("./src/core/index.ts") },
      { find: /^@domain\/(.*)$/, replacement: fromRoot("./src/core/domain/$1") },
      { find: /^@services\/(.*)$/, replacement: fromRoot("./src/core/services/$1") },
      { find: /^@lib\/(.*)$/, replacement: fromRoot("./src/core/lib/$1") },
      { find: /^@cli\/(.*)$/, replacement: fromRoot("./src/cli/$1") },
    ],
  },
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
  },
})
