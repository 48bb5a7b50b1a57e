import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const parserSrc = fileURLToPath(new URL("./packages/markdown-parser/src", import.meta.url));

export default defineConfig({
  resolve: {
    alias: [{ find: /^@\/(.*)$/, replacement: `${parserSrc}/$1` }],
  },
  test: {
    environment: "node",
    include: ["packages/**/tests/**/*.test.ts"],
  },
});
