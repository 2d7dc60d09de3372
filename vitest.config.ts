import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    // East of UTC, so local midnight falls on the previous UTC day.
    env: { TZ: "Europe/Berlin" },
    include: ["sdks/typescript/tests/**/*.test.ts"],
  },
});
