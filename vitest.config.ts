import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["topography/**/*.test.ts"],
    exclude: ["node_modules/**"],
    env: {
      LOG_LEVEL: "error",
      NO_COLOR: "1",
    },
  },
});
