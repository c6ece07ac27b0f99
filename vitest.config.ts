import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts", "examples/**/*.test.ts"],
    // script.ts exports a function named `then`; Vite's module runner awaits
    // module namespaces, which makes that module a thenable and hangs. Load
    // modules with native `import` (TypeScript via the tsx loader) instead.
    experimental: {
      viteModuleRunner: false,
      nodeLoader: false,
    },
    execArgv: ["--import", "tsx"],
  },
});
