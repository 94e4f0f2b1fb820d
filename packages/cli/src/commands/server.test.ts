/**
 * Server CLI Command Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';

// ============================================================================
// Hoisted mocks
// ============================================================================

const mockStartGateway = vi.hoisted(() => vi.fn());
const mockClose = vi.hoisted(() => vi.fn());

vi.mock('@taskrelay/gateway', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@taskrelay/gateway')>();
  return { ...actual, startServer: mockStartGateway };
});

import { resolveServerConfig, startServer } from './server.js';
import { spyOnConsole } from '../test-helpers.js';

describe('resolveServerConfig', () => {
  it('reads the environment', () => {
    const config = resolveServerConfig({}, { PORT: '9000', HOST: '0.0.0.0', MAX_CONCURRENT_STEPS: '2' });

    expect(config.port).toBe(9000);
    expect(config.host).toBe('0.0.0.0');
    expect(config.engine.maxConcurrentSteps).toBe(2);
  });

  it('lets flags override the listen address', () => {
    const config = resolveServerConfig({ port: 3100, host: 'localhost' }, { PORT: '9000' });

    expect(config.port).toBe(3100);
    expect(config.host).toBe('localhost');
  });
});

describe('server command', () => {
  let out: ReturnType<typeof spyOnConsole>;
  let onSpy: MockInstance<typeof process.on>;

  beforeEach(() => {
    vi.clearAllMocks();
    out = spyOnConsole();
    onSpy = vi.spyOn(process, 'on').mockImplementation(() => process);
    mockStartGateway.mockResolvedValue({ port: 3100, close: mockClose });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('starts the gateway with the resolved config', async () => {
    await startServer({ port: 3100, host: '127.0.0.1' });

    expect(mockStartGateway).toHaveBeenCalledWith(expect.objectContaining({ port: 3100, host: '127.0.0.1' }));
    expect(out.lines()).toContain('✅ Server running at http://127.0.0.1:3100');
    expect(out.lines()).toContain('   Plans:        http://127.0.0.1:3100/api/v1/plans');
  });

  it('installs signal handlers', async () => {
    await startServer({ port: 3100 });

    expect(onSpy).toHaveBeenCalledWith('SIGINT', expect.any(Function));
    expect(onSpy).toHaveBeenCalledWith('SIGTERM', expect.any(Function));
  });

  it('sets a failing exit code when the gateway cannot start', async () => {
    mockStartGateway.mockRejectedValue(new Error('EADDRINUSE'));

    await startServer({ port: 3100 });

    expect(out.error).toHaveBeenCalledWith('❌ Server failed to start:', 'EADDRINUSE');
    expect(process.exitCode).toBe(1);
    expect(onSpy).not.toHaveBeenCalled();
  });
});
