import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@core$/, replacement: fromRoot('./core/index.ts') },
      { find: /^@core\//, replacement: fromRoot('./core/') },
      { find: /^@app\//, replacement: fromRoot('./app/') },
      { find: /^@bot\//, replacement: fromRoot('./bot/') },
    ],
  },
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15000,
  },
});
