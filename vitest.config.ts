import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    setupFiles: ["test/setup/unit.ts"],
    env: {
      APP_MODE: "local",
      OPENAI_API_KEY: "test-key",
      OPENAI_MODEL: "gpt-4.1-mini",
      QDRANT_COLLECTION: "latex-examples",
      LOG_LEVEL: "error"
    },
    restoreMocks: true,
    mockReset: true,
    clearMocks: true,
    unstubEnvs: true,
    fileParallelism: false,
    pool: "threads",
    poolOptions: {
      threads: {
        singleThread: true
      }
    },
    coverage: {
      provider: "v8",
      all: true,
      reporter: ["text", "json-summary", "html"],
      include: ["src/**/*.ts"],
      exclude: ["src/**/*.d.ts", "src/**/types.ts", "src/scripts/**"],
      thresholds: {
        perFile: true,
        functions: 90,
        lines: 85,
        statements: 85,
        branches: 80
      }
    }
  }
});
