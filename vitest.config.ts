import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    include: ["test/**/*.test.ts", "tests/**/*.test.ts"],
    setupFiles: ["test/testSetup.ts"],
    root: ".",
  },
});
