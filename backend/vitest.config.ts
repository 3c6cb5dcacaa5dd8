import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    // Route tests bind real ephemeral ports; keep files sequential.
    fileParallelism: false,
    exclude: ['dist/**', 'node_modules/**'],
  },
})
