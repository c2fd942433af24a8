import { fileURLToPath } from "node:url";

import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./backend/src", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    include: ["backend/src/**/*.test.ts"],
    setupFiles: ["backend/src/test/setupEnv.ts"],
    restoreMocks: false,
  },
});
