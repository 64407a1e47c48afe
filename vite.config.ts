import { defineConfig, type Plugin } from "vite";
import dts from "vite-plugin-dts";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const root = path.dirname(fileURLToPath(import.meta.url));

/**
 * Replace __DEV__ with a runtime NODE_ENV check so consumers' bundlers
 * can drop dev-only assertions.
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

// Bare imports such as "type_primitives" resolve to src/<dir>
export const srcAliases = Object.fromEntries(
  fs
    .readdirSync(path.resolve(root, "src"), { withFileTypes: true })
    .filter((dirent) => dirent.isDirectory())
    .map((dirent) => [dirent.name, path.resolve(root, `./src/${dirent.name}`)]),
);

export default defineConfig(({ command }) => ({
  plugins: [
    ...(command === "build"
      ? [replaceDevGlobals(), dts({ tsconfigPath: "./tsconfig.build.json" })]
      : []),
  ],

  define: command === "build" ? {} : { __DEV__: "true" },

  resolve: {
    alias: srcAliases,
  },

  build: {
    target: "es2022",
    lib: {
      entry: path.resolve(root, "src/index.ts"),
      formats: ["es", "cjs"],
      fileName: (format) => (format === "es" ? "index.js" : "index.cjs"),
    },
    rollupOptions: {
      external: ["zod"],
    },
  },
}));
