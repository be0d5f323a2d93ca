import type { KnipConfig } from "knip";

const config: KnipConfig = {
  workspaces: {
    "packages/sliceql": {
      entry: ["src/index.ts"],
      project: ["src/**/*.ts", "tests/**/*.ts"],
    },
  },
};

export default config;
