import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, vi } from 'vitest';
import { resetServiceRegistry, type StatusEvent } from '@taskrelay/core';
import { formatEvent, runPlanFile, toEngineConfig } from './run.js';
import { createPlanDir, spyOnConsole, type PlanDir } from '../test-helpers.js';

// ============================================================================
// Formatting
// ============================================================================

describe('formatEvent', () => {
  const base = { planId: 'p1', timestamp: '2026-01-01T00:00:00.000Z' };

  it('formats plan transitions', () => {
    const event: StatusEvent = { ...base, kind: 'plan', sequence: 1, from: 'pending', to: 'running' };
    expect(formatEvent(event)).toBe('[  1] plan: pending → running');
  });

  it('includes retry details', () => {
    const event: StatusEvent = {
      ...base,
      kind: 'step',
      stepId: 'find',
      sequence: 12,
      from: 'running',
      to: 'pending',
      retry: { attempt: 1, maxRetries: 3, delayMs: 1000 },
      error: { code: 'AGENT_TRANSIENT', message: 'busy', transient: true },
    };
    expect(formatEvent(event)).toBe(
      '[ 12] step find: running → pending (retry 1/3 in 1000ms) - AGENT_TRANSIENT: busy',
    );
  });
});

describe('toEngineConfig', () => {
  it('maps only the flags that were given', () => {
    expect(toEngineConfig({})).toEqual({});
    expect(toEngineConfig({ concurrency: 2, timeout: 500, retries: 0, failFast: true })).toEqual({
      maxConcurrentSteps: 2,
      stepTimeoutMs: 500,
      maxRetries: 0,
      failurePolicy: 'fail-fast',
    });
  });
});

// ============================================================================
// Execution
// ============================================================================

describe('run command', () => {
  let plans: PlanDir;
  let out: ReturnType<typeof spyOnConsole>;

  beforeAll(async () => {
    plans = await createPlanDir();
  });

  afterAll(async () => {
    await plans.cleanup();
  });

  beforeEach(() => {
    out = spyOnConsole();
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await resetServiceRegistry();
  });

  const trip = {
    id: 'trip',
    goal: 'Book a trip',
    steps: [
      { id: 'find', capability: 'search', parameters: { action: 'look up flights' } },
      { id: 'tell', capability: 'messaging', parameters: { text: 'Found: {{find.summary}}' }, depends_on: ['find'] },
    ],
  };

  it('prints transitions and a summary', async () => {
    const file = await plans.write('trip.json', trip);

    await runPlanFile(file, { delay: 0 });

    const lines = out.lines();
    expect(lines[0]).toBe('🚀 Running plan trip: Book a trip');
    expect(lines[1]).toBe('[  1] plan: pending → running');
    expect(lines).toContain('[  3] step find: running → succeeded');
    expect(lines.slice(-4)).toEqual([
      '',
      '✅ Plan trip succeeded',
      '   - find [search] succeeded',
      '   - tell [messaging] succeeded',
    ]);
    expect(lines[lines.length - 5]).toMatch(/^\[ {2}\d\] plan: running → succeeded$/);
    expect(process.exitCode).toBeUndefined();
  });

  it('passes results between steps and prints the snapshot as JSON', async () => {
    const file = await plans.write('trip-json.json', trip);

    await runPlanFile(file, { delay: 0, json: true });

    expect(out.log).toHaveBeenCalledTimes(1);
    const snapshot = JSON.parse(out.lines()[0] ?? '');
    expect(snapshot).toMatchObject({
      id: 'trip',
      status: 'succeeded',
      steps: [
        { id: 'find', status: 'succeeded' },
        {
          id: 'tell',
          status: 'succeeded',
          result: { capability: 'messaging', parameters: { text: 'Found: Action Completed: look up flights' } },
        },
      ],
    });
  });

  it('exits non-zero when a step fails', async () => {
    const file = await plans.write('teleport.json', {
      id: 'beam',
      goal: 'Beam up',
      steps: [{ id: 'x', capability: 'teleport' }],
    });

    await runPlanFile(file, { delay: 0 });

    expect(out.lines().slice(-2)).toEqual([
      '❌ Plan beam failed',
      "   - x [teleport] failed (UNKNOWN_CAPABILITY: No agent registered for capability 'teleport')",
    ]);
    expect(process.exitCode).toBe(1);
  });

  it('refuses an invalid plan without running it', async () => {
    const file = await plans.write('dup.json', {
      goal: 'Twice',
      steps: [
        { id: 'a', capability: 'search' },
        { id: 'a', capability: 'search' },
      ],
    });

    await runPlanFile(file, { delay: 0 });

    expect(out.error).toHaveBeenCalledWith("❌ Invalid plan (DuplicateStepId): Step id 'a' is used more than once");
    expect(out.log).not.toHaveBeenCalled();
    expect(process.exitCode).toBe(1);
  });

  it('reports unreadable files', async () => {
    await runPlanFile('/nonexistent/plan.json', {});

    expect(out.error).toHaveBeenCalledWith(expect.stringMatching(/^❌ Cannot read plan file \/nonexistent\/plan\.json: /));
    expect(process.exitCode).toBe(1);
  });
});
