/**
 * Vitest setup file for global test configuration
 * Runs before each test file
 */

import { logger } from '../utils/logger';

// Reduce log noise in tests
Object.assign(process.env, {
  NODE_ENV: 'test',
  LOG_LEVEL: 'error'
});
logger.setLevel('error');

afterEach(() => {
  vi.restoreAllMocks();
  vi.useRealTimers();
});
