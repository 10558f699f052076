import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      TELEGRAM_BOT_TOKEN: 'test-token',
    },
  },
});
