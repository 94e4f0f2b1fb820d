/**
 * Global Test Setup, runs before every test file in gateway.
 *
 * Silences getLog() so route and socket tests do not print. Tests that
 * assert on log calls declare their own `vi.mock` for the log module.
 */

import { vi } from 'vitest';

vi.mock('./services/log.js', () => ({
  getLog: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn(),
  }),
}));
