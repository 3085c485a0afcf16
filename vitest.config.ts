import { fileURLToPath } from "url";
import { dirname, resolve } from "path";
import { defineConfig } from "vitest/config";
import tsconfigPaths from "vite-tsconfig-paths";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export default defineConfig({
  plugins: [tsconfigPaths()],
  resolve: {
    alias: [
      { find: /^@voxreel\/shared\/(.*)$/, replacement: resolve(__dirname, "packages/shared/src/$1") },
    ],
  },
  test: {
    environment: "node",
    include: ["test/**/*.test.ts", "packages/shared/test/**/*.test.ts", "apps/worker/test/**/*.test.ts"],
    setupFiles: [resolve(__dirname, "packages/shared/test/setup.ts")],
    env: {
      NODE_ENV: "test",
      DOTENV_CONFIG_PATH: resolve(__dirname, "./.env.test"),
    },
    coverage: {
      provider: "v8",
      reporter: ["text", "json-summary"],
      reportsDirectory: "./coverage",
      exclude: [
        "**/node_modules/**",
        "**/dist/**",
        "**/*.d.ts",
        "**/test/**",
        "**/*.test.ts",
        "apps/worker/src/worker.ts",
      ],
    },
  },
});
