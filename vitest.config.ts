import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['*/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@support-mesh/agent-consumer': fileURLToPath(new URL('./sdk-agent-consumer/src/index.ts', import.meta.url)),
    },
  },
});
