/**
 * Root test setup file
 *
 * Runs before every test file. Keeps file transports off and
 * silences console output unless a test asserts on it.
 */

import { vi } from 'vitest';

process.env.NODE_ENV = 'test';
process.env.LOG_FILE = 'false';
process.env.LOG_CONSOLE = 'false';

global.console = {
  ...console,
  log: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};
