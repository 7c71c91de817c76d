import { defineConfig } from "vitest/config";
import { fileURLToPath } from "node:url";

const pkg = (dir: string) => fileURLToPath(new URL(`./packages/${dir}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@stevedore/cli-core": pkg("core"),
      "@stevedore/cli-metrics": pkg("metrics"),
      "@stevedore/backend-ecs": pkg("backend-ecs"),
      "@stevedore/cli": pkg("cli"),
    },
  },
  test: {
    environment: "node",
    include: ["packages/**/src/**/*.spec.ts", "packages/**/src/**/*.test.ts"],
    env: {
      STEVEDORE_LOG_LEVEL: "silent",
      STEVEDORE_METRICS_DISABLE: "1",
    },
  },
});
