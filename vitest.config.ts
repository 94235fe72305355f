import { defineConfig } from "vitest/config";
import fs from "fs";
import { fileURLToPath } from "url";

const src_dir = fileURLToPath(new URL("./src", import.meta.url));

export default defineConfig({
  define: {
    __DEV__: true,
  },
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    benchmark: {
      include: ["src/**/*.bench.ts"],
    },
    alias: Object.fromEntries(
      fs
        .readdirSync(src_dir, { withFileTypes: true })
        .filter((dirent) => dirent.isDirectory())
        .map((dirent) => [dirent.name, `${src_dir}/${dirent.name}`]),
    ),
  },
});
