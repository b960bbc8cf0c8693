import { defineConfig } from "vite";
import fs from "fs";
import path from "path";

// Library bundle of the registry; `npm run bundle`
export default defineConfig(() => ({
  define: {
    __DEV__: JSON.stringify(process.env.NODE_ENV === "development"),
    __PROD__: JSON.stringify(process.env.NODE_ENV === "production"),
  },

  resolve: {
    // alias for every top level directory in src
    alias: Object.fromEntries(
      fs
        .readdirSync(path.resolve(__dirname, "src"), { withFileTypes: true })
        .filter((dirent) => dirent.isDirectory())
        .map((dirent) => [
          dirent.name,
          path.resolve(__dirname, `./src/${dirent.name}`),
        ]),
    ),
  },

  build: {
    lib: {
      entry: path.resolve(__dirname, "src/index.ts"),
      name: "FemTags",
      fileName: (format: string) => `fem-tags.${format}.js`,
    },
  },
}));
