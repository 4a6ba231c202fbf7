import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const source = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@clausekit\/core$/, replacement: `${source('core')}/index.ts` },
      { find: /^@clausekit\/mysql\/register$/, replacement: `${source('mysql')}/register.ts` },
      { find: /^@clausekit\/mysql$/, replacement: `${source('mysql')}/index.ts` },
      {
        find: /^@clausekit\/postgresql\/register$/,
        replacement: `${source('postgresql')}/register.ts`,
      },
      { find: /^@clausekit\/postgresql$/, replacement: `${source('postgresql')}/index.ts` },
    ],
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', '**/__tests__/**'],
    },
  },
});
