import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const packages = ['types', 'crypto', 'ledger', 'cli'];

const alias: Record<string, string> = {};
for (const pkg of packages) {
  alias[`@tessera/${pkg}`] = fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: { alias },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts', 'tests/**/*.test.ts'],
  },
});
