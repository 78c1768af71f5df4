import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      "@ringside-kit/combat-core": pkg("combat-core"),
      "@ringside-kit/gesture-core": pkg("gesture-core"),
      "@ringside-kit/handtracking-tfjs": pkg("handtracking-tfjs"),
      "@ringside-kit/game-react": pkg("game-react"),
    },
  },
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node",
  },
});
