import { defineConfig } from "vitest/config";
import preact from "@preact/preset-vite";

export default defineConfig({
  // Served from the relay server's static root, so relative asset paths.
  base: "./",
  plugins: [preact()],
  build: {
    target: "es2022",
    sourcemap: true
  },
  server: {
    port: 5173,
    proxy: {
      "/generate": "http://localhost:5001",
      "/api": "http://localhost:5001"
    }
  },
  test: {
    include: ["src/**/*.test.ts", "src/**/*.test.tsx"]
  }
});
