import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/tests/**/*.test.ts"],
    // tree-sitter is a native add-on; keep it out of worker threads
    pool: "forks",
  },
});
