import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const sharedSrc = fileURLToPath(new URL("./shared/src/", import.meta.url));

export default defineConfig({
  resolve: {
    alias: [{ find: /^@driveassist\/shared\/(.*)$/, replacement: `${sharedSrc}$1.ts` }],
  },
  test: {
    include: ["server/test/**/*.test.ts"],
    environment: "node",
  },
});
