import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["demangler/tests/**/*.test.ts"],
    environment: "node",
  },
});
