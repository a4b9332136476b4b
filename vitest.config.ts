import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    setupFiles: ["tests/setup/supabaseEnv.ts"],
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts", "lib/**/*.test.ts"],
    alias: {
      "@": path.resolve(__dirname, "."),
    },
  },
});
