import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    setupFiles: ['test/setup.ts'],
    env: {
      ANTHROPIC_API_KEY: '',
      OPENAI_API_KEY: '',
      GOOGLE_AI_API_KEY: '',
    },
  },
});
