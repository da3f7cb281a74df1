import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    include: [
      "packages/*/src/**/__tests__/**/*.(c|m)?[jt]s",
      "packages/*/src/**/?(*.)+(spec|test).(c|m)?[jt]s",
    ],
  },
});
