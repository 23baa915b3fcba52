import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'web/src/**/*.{test,spec}.{ts,tsx}'],
    restoreMocks: true,
  },
});
