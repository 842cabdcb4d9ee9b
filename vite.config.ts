import { defineConfig, type Plugin } from "vite";
import dts from "vite-plugin-dts";
import fs from "fs";
import path from "path";

/**
 * One alias per top-level directory in src, so `utils/error` and
 * `type_primitives` resolve the same way tsconfig `paths` does.
 */
export function src_aliases(): Record<string, string> {
  return Object.fromEntries(
    fs
      .readdirSync(path.resolve(__dirname, "src"), { withFileTypes: true })
      .filter((dirent) => dirent.isDirectory() && dirent.name !== "__tests__")
      .map((dirent) => [
        dirent.name,
        path.resolve(__dirname, `./src/${dirent.name}`),
      ]),
  );
}

/**
 * Replace __DEV__ with a runtime process.env check so consumers'
 * bundlers can tree-shake the dev-only contract checks.
 */
function replaceDevGlobals(): Plugin {
  return {
    name: "replace-dev-globals",
    transform(code, id) {
      if (id.includes("node_modules")) return null;
      const result = code.replace(
        /\b__DEV__\b/g,
        'process.env.NODE_ENV !== "production"',
      );
      return result !== code ? result : null;
    },
  };
}

export default defineConfig(({ command }) => ({
  plugins: [
    ...(command === "build"
      ? [replaceDevGlobals(), dts({ tsconfigPath: "./tsconfig.build.json" })]
      : []),
  ],

  define: command === "build" ? {} : { __DEV__: "true" },

  resolve: {
    alias: src_aliases(),
  },

  build: {
    target: "es2022",
    lib: {
      entry: path.resolve(__dirname, "src/index.ts"),
      formats: ["es", "cjs"],
      fileName: (format) => (format === "es" ? "index.js" : "index.cjs"),
    },
  },
}));
