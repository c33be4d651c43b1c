import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/engine/vitest.config.ts',
  'packages/cli/vitest.config.ts',
]);
