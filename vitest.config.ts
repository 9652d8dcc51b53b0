import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Listed one by one so a stray file under packages/ is never picked up
    // as a project of its own. DOM tests opt into jsdom per file.
    projects: [
      'packages/dom',
      'packages/errors',
      'packages/http',
      'packages/store',
      'packages/testing',
      'apps/users',
    ],
  },
})
