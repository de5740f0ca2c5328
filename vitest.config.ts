import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["releasectl/test/**/*.test.ts"],
    environment: "node",
  },
});
