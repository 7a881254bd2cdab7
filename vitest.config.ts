import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["packages/*/{src,test}/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent"
    }
  }
});
