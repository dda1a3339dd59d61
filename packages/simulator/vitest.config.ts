import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        include: ["test/**/*.test.ts"],
        testTimeout: 30000,
        globals: true,
        env: {
            LOG_LEVEL: "silent",
            FORCE_COLOR: "0",
        },
    },
});
