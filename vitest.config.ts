import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const WORKSPACE_PACKAGES = ['translation', 'translator-mock', 'translator-google', 'core'];

// Workspace packages export their compiled dist/ at run time; tests load the sources.
const sourceAliases = Object.fromEntries(
  WORKSPACE_PACKAGES.map((name) => [
    `@transjson/${name}`,
    fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
  ])
);

export default defineConfig({
  resolve: {
    alias: sourceAliases,
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
  },
});
