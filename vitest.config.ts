import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const packages = fileURLToPath(new URL('./packages', import.meta.url));

export default defineConfig({
  resolve: {
    // Tests run against workspace sources; package exports point Node at dist/
    alias: [
      { find: /^@enginelens\/uci\/errors$/, replacement: `${packages}/uci/src/errors.ts` },
      {
        find: /^@enginelens\/uci\/protocol$/,
        replacement: `${packages}/uci/src/protocol/index.ts`,
      },
      { find: /^@enginelens\/([a-z-]+)$/, replacement: `${packages}/$1/src/index.ts` },
    ],
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 10000,
  },
});
