import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Listed explicitly so a stray config file under packages/ is never
    // picked up as a project of its own.
    projects: ['packages/forms', 'packages/errors', 'packages/testing'],
  },
})
