import { defineConfig } from "vitest/config";
import { srcAliases } from "./vite.config";

export default defineConfig({
  define: {
    __DEV__: true,
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    alias: srcAliases,
  },
});
