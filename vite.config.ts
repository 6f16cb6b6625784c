import { builtinModules } from "node:module";
import { defineConfig } from "vite";

export default defineConfig({
  build: {
    outDir: "dist",
    emptyOutDir: true,
    target: "node20",
    lib: {
      entry: "src/index.ts",
      name: "docxParts",
    },
    sourcemap: true,
    minify: false,
    rollupOptions: {
      external: ["jszip", "@xmldom/xmldom", ...builtinModules, /^node:/],
      output: [
        { format: "es", entryFileNames: "docx-parts.mjs" },
        { format: "cjs", entryFileNames: "docx-parts.cjs", exports: "named" },
      ],
    },
  },
});
