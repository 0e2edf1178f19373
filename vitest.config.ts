import { fileURLToPath } from "node:url"
import { defineConfig } from "vitest/config"

export default defineConfig({
  resolve: {
    alias: {
      "@/": fileURLToPath(new URL("./packages/markup-parser/src/", import.meta.url)),
      "@docweave/markup-parser": fileURLToPath(new URL("./packages/markup-parser/src/index.ts", import.meta.url)),
    },
  },
  test: {
    include: ["packages/*/tests/**/*.test.ts"],
  },
})
