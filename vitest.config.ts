import { defineConfig } from "vitest/config";

export default defineConfig({
    test: {
        globals: true,
        environment: "node",
        include: ["tests/**/*.test.ts"],
        testTimeout: 10000,
        // Migrations log at INFO on every fresh database; keep test output to warnings+.
        env: {
            WORKBENCH_LOG_LEVEL: "warn",
        },
        coverage: {
            // Run with: npm run test:coverage
            provider: "v8",
            reporter: ["text", "html"],
            include: ["src/**/*.ts"],
            exclude: ["src/index.ts"],
            thresholds: {
                "src/{registry,dispatcher,schema}.ts": {
                    statements: 80,
                    branches: 70,
                    functions: 80,
                    lines: 80,
                },
            },
        },
    },
});
