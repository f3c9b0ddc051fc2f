import { defineConfig, defineProject } from "vitest/config"

export default defineConfig({
  test: {
    projects: [
      defineProject({
        test: {
          name: "notify",
          include: ["packages/notify/**/*.test.ts"],
        },
      }),
    ],
  },
})
