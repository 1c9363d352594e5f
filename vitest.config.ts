import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@": fileURLToPath(new URL("./web/widget/src", import.meta.url)),
    },
  },
  test: {
    include: ["services/*/tests/**/*.test.ts", "web/widget/tests/**/*.test.ts"],
    environment: "node",
  },
});
