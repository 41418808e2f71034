import { defineConfig } from "vitest/config";
import path from "path";
import { fileURLToPath } from "url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@refinum/core": path.resolve(__dirname, "src/index.ts"),
    },
  },
  test: {
    name: "@refinum/core",
    globals: true,
    environment: "node",
    include: ["tests/**/*.test.ts"],
  },
});
