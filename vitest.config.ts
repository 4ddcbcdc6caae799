import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
  },
  resolve: {
    extensions: ['.ts', '.js', '.mts', '.mjs'],
    alias: {
      '@devcrew/crew-contracts': pkg('crew-contracts'),
      '@devcrew/crew-runtime': pkg('crew-runtime'),
      '@devcrew/progress-reporter': pkg('progress-reporter'),
      '@devcrew/iteration-engine': pkg('iteration-engine'),
    },
  },
});
