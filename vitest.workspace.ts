import { defineWorkspace } from 'vitest/config'

export default defineWorkspace([
  {
    test: {
      name: '@gridcalc/lib',
      root: './packages/lib',
      environment: 'node',
      globals: true,
      include: ['src/**/*.{test,spec}.ts'],
      setupFiles: ['./src/test/setup.ts'],
    },
  },
])
