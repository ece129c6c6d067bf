import {defineConfig} from '@bfra.me/eslint-config'

export default defineConfig(
  {
    name: 'git-ssh-bootstrap',
    ignores: ['bundle/**', 'dist/**'],
    typescript: {
      tsconfigPath: './tsconfig.json',
    },
    vitest: true,
  },
  {
    name: 'vitest overrides',
    files: ['**/*.test.ts'],
    rules: {
      'vitest/prefer-lowercase-title': ['error', {ignore: ['describe']}],
    },
  },
)
