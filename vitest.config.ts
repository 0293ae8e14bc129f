import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include: ["test/**/*.test.ts"],
        // the statistical scenarios simulate tens of thousands of minutes
        testTimeout: 30000,
    },
});
