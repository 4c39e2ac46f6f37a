import {readdirSync} from 'node:fs';
import {defineConfig} from 'vitest/config';

// Every packages/*/vitest.config.ts is a project.
function* getProjects(): Iterable<string> {
  const packagesURL = new URL('./packages/', import.meta.url);
  for (const entry of readdirSync(packagesURL, {withFileTypes: true})) {
    if (!entry.isDirectory()) continue;
    const files = readdirSync(new URL(`${entry.name}/`, packagesURL));
    if (files.includes('vitest.config.ts')) {
      yield `packages/${entry.name}/vitest.config.ts`;
    }
  }
}

export default defineConfig({
  test: {
    projects: [...getProjects()],
  },
});
