import { tmpdir } from "node:os";
import { join } from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    env: {
      KOSTORE_CONFIG_DIR: join(tmpdir(), "kostore-test-config"),
      KOSTORE_LOG_LEVEL: "error",
    },
  },
});
