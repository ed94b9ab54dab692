import { defineConfig } from 'tsup';

export default defineConfig({
    entry: {
        index: 'src/index.ts',
        redact: 'src/redact.ts',
    },
    format: ['esm', 'cjs'],
    dts: true,
    sourcemap: false,
    clean: true,
    minify: true,
    treeshake: true,
    outDir: 'dist',
    skipNodeModulesBundle: true
});
