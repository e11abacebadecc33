import { defineConfig } from "vitest/config"

export default defineConfig({
    test: {
        include: ["src/**/*.test.ts"],
        environment: "node",
        env: { ASSISTANT_QUIET: "1" },
    },
})
