import { defineWorkspace } from 'vitest/config';

export default defineWorkspace(['packages/review', 'packages/action']);
