import { defineConfig } from 'vitest/config';

// SheetJS fixes its date base at module load, so the timezone must be set before any worker starts.
process.env.TZ = 'Asia/Kolkata';

export default defineConfig({
  test: {
    include: ['src/tests/**/*.spec.ts'],
    environment: 'node',
  },
});
