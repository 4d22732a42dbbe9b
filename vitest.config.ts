import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    testTimeout: 20000,
    hookTimeout: 20000,
    setupFiles: ['tests/setup.ts'],
    env: {
      NCD_DRIVER: 'virtual',
      FORCE_COLOR: '0'
    }
  },
})
