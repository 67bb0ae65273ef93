import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    // every suite writes its own file under test/fixture
    fileParallelism: false,
  },
});
