import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    // Tests run against the shared sources, not its build output.
    alias: {
      "@incident/shared": fileURLToPath(new URL("./shared/src/index.ts", import.meta.url))
    }
  },
  test: {
    include: ["shared/tests/**/*.test.ts", "engine/tests/**/*.test.ts"],
    environment: "node"
  }
});
