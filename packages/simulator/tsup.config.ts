import { defineConfig } from "tsup";

export default defineConfig({
    entry: ["src/main.ts", "src/simulator.ts"],
    format: ["esm"],
    target: "node20",
    outDir: "dist",
    clean: true,
    sourcemap: true,
    splitting: false,
    bundle: true,
    // The finder workspace ships TypeScript sources, so it is bundled in
    noExternal: ["@token-slots/finder"],
    banner: { js: "#!/usr/bin/env node" },
});
