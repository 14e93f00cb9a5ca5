import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['bin/runtrail.ts'],
  format: ['esm'],
  clean: true,
  sourcemap: true,
  external: ['@runtrail/core', '@runtrail/client', '@runtrail/shared', 'commander'],
});
