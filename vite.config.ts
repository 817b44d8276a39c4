import { defineConfig } from "vite";
import { fileURLToPath, URL } from "node:url";

const resolveAlias = {
  "@features": fileURLToPath(new URL("./src/features", import.meta.url)),
  "@ui": fileURLToPath(new URL("./src/ui", import.meta.url)),
  "@lib": fileURLToPath(new URL("./src/lib", import.meta.url)),
  "@utils": fileURLToPath(new URL("./src/utils", import.meta.url)),
  "@config": fileURLToPath(new URL("./src/config", import.meta.url)),
};

// https://vite.dev/config/
export default defineConfig({
  resolve: {
    alias: resolveAlias,
  },
  clearScreen: false,
  server: {
    port: 5173,
    strictPort: true,
  },
});
