import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/testing.ts'],
  format: ['esm'],
  dts: true,
  clean: true,
  sourcemap: true,
  external: ['@runtrail/shared', '@runtrail/client', 'pino', 'yaml', 'dotenv'],
});
