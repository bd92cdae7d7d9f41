import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/state-sequelize/vitest.config.ts',
  'packages/openai/vitest.config.ts',
  'packages/cli/vitest.config.ts',
]);
