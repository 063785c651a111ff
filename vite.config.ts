import { fileURLToPath } from "url";
import { defineConfig } from "vite";

const port = Number.parseInt(process.env.POSTER_DEV_PORT ?? "", 10);

export default defineConfig({
  root: ".",
  base: "./",
  build: {
    outDir: "dist",
    rollupOptions: {
      input: {
        main: fileURLToPath(new URL("./index.html", import.meta.url))
      }
    }
  },
  server: {
    port: Number.isFinite(port) ? port : 5173,
    open: true,
    strictPort: false
  }
});
