import { defineConfig } from 'vite';
import { resolve } from 'path';
import dts from 'vite-plugin-dts';

export default defineConfig({
    plugins: [
        dts({
            rollupTypes: false,
            outDir: 'dist',
            exclude: ['src/__tests__/**', 'src/verify.ts']
        })
    ],
    build: {
        lib: {
            entry: resolve(__dirname, 'src/index.ts'),
            name: 'FifthlineTheory',
            fileName: 'index'
        }
    }
});
