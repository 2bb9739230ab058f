import { defineConfig } from 'tsdown';

export default defineConfig({
  entry: {
    index: './src/index.ts',
  },
  format: 'esm',
  clean: true,
  dts: true,
  target: 'node20',
  platform: 'node',
  external: ['ansis', 'debug', 'execa'],
});
