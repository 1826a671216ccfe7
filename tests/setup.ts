/**
 * Global test setup
 * Runs before every test file
 */

import { vi } from 'vitest';

// Mock environment variables for testing
process.env.BOT_TOKEN = 'test-bot-token';
process.env.DATABASE_PATH = ':memory:';
process.env.LOG_LEVEL = 'error';

// Keep winston off the disk and out of the console; tests assert on these mocks
vi.mock('../src/utils/logger', () => ({
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
  },
  updateLogLevel: vi.fn(),
  StructuredLogger: {
    logModerationEvent: vi.fn(),
    logSecurityEvent: vi.fn(),
    logError: vi.fn(),
    logDebug: vi.fn(),
  },
}));
