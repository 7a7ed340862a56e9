import * as path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
    resolve: {
        alias: {
            "@repo/edne-core": path.resolve(__dirname, "packages/core/index.ts"),
        },
    },
    test: {
        include: ["packages/*/test/**/*.test.ts", "apps/*/test/**/*.test.ts"],
        environment: "node",
    },
});
