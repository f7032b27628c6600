/**
 * Global test setup for Jest
 *
 * Keeps tests away from the real user configuration and quiets the
 * diagnostic logger.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

// Suppress console output during tests (unless TEST_VERBOSE=true)
if (!process.env.TEST_VERBOSE) {
  global.console = {
    ...console,
    log: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    // Keep error for debugging test failures
    error: console.error,
  };
}

process.env.NODE_ENV = 'test';
process.env.EGERIA_LOG_SILENT = 'true';

// A private config home per test file; nothing reads ~/.config/egeria
process.env.XDG_CONFIG_HOME = fs.mkdtempSync(path.join(os.tmpdir(), 'egeria-test-config-'));

for (const name of [
  'EGERIA_PLATFORM_URL',
  'EGERIA_VIEW_SERVER_URL',
  'EGERIA_VIEW_SERVER',
  'EGERIA_USER',
  'EGERIA_USER_PASSWORD',
  'EGERIA_FORMAT_SETS_DIR',
  'EGERIA_REPORT_FORMATS_JSON',
  'EGERIA_CONSOLE_WIDTH',
  'EGERIA_TIMEOUT_SECONDS',
  'EGERIA_VERIFY_SSL',
  'EGERIA_LOG_LEVEL',
  'EGERIA_LOG_FILE',
]) {
  delete process.env[name];
}
