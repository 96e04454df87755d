import { fileURLToPath } from "url";
import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        environment: "node",
        include    : [
            "packages/*/src/**/*.test.ts",
            "apps/*/src/**/*.test.ts",
        ],
        testTimeout: 10000,
    },
    resolve: {
        alias: {
            "@govwatch/engine": fileURLToPath(new URL("./packages/engine/src/index.ts", import.meta.url)),
        },
    },
});
