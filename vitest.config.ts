import { fileURLToPath } from "node:url"
import { defineConfig, defineProject } from "vitest/config"

const alias = {
  "@lockstep/engine": fileURLToPath(
    new URL(`./packages/engine/src/index.ts`, import.meta.url)
  ),
}

export default defineConfig({
  test: {
    projects: [
      defineProject({
        test: {
          name: `engine`,
          include: [`packages/engine/test/**/*.test.ts`],
          exclude: [`**/node_modules/**`],
        },
        resolve: { alias },
      }),
      defineProject({
        test: {
          name: `dao`,
          include: [`packages/dao/test/**/*.test.ts`],
          exclude: [`**/node_modules/**`],
        },
        resolve: { alias },
      }),
    ],
  },
})
