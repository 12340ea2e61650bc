// vitest.config.ts
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,          // <-- enable describe/it/expect as globals
    environment: "node",
    include: ["src/**/*.test.ts"]
  }
});
