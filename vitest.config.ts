import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tally-main/tests/**/*.test.ts", "tally-cli/tests/**/*.test.ts"],
    environment: "node",
  },
});
