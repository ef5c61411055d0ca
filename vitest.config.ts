import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["benchctl/test/**/*.test.ts"],
    environment: "node",
  },
});
