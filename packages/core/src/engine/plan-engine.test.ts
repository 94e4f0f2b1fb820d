import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { PlanEngine } from './plan-engine.js';
import { registerSimulatedAgents } from '../agents/simulated.js';
import { ConflictError, NotFoundError } from '../types/errors.js';
import type { PlanInput } from '../plan/types.js';
import type { StatusEvent } from '../events/types.js';
import type { PlanEngineOptions, PlanHandle } from './plan-engine.js';

const input: PlanInput = {
  goal: 'Plan a team offsite',
  steps: [
    { id: 'venue', capability: 'search', parameters: { action: 'find venues' } },
    {
      id: 'book',
      capability: 'calendar',
      dependsOn: ['venue'],
      parameters: { action: 'book', note: 'From search: {{venue.summary}}' },
    },
  ],
};

function createEngine(config: PlanEngineOptions = {}): PlanEngine {
  const engine = new PlanEngine({
    ...config,
    config: { backoff: { initialDelayMs: 0, jitter: false }, ...config.config },
  });
  registerSimulatedAgents(engine.agents);
  return engine;
}

function started(engine: PlanEngine, plan: PlanInput, planId?: string): PlanHandle {
  const result = engine.start(plan, planId ? { planId } : {});
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
}

describe('PlanEngine', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs a plan with simulated agents', async () => {
    const engine = createEngine();
    const handle = started(engine, input);

    const snapshot = await handle.done;

    expect(snapshot.status).toBe('succeeded');
    expect(snapshot.id).toBe(handle.planId);
    expect(snapshot.steps.find((s) => s.id === 'book')?.result).toEqual({
      capability: 'calendar',
      summary: 'Action Completed: book',
      parameters: { action: 'book', note: 'From search: Action Completed: find venues' },
    });
  });

  it('returns validation failures without running anything', () => {
    const engine = createEngine();
    const result = engine.start({
      goal: 'loop',
      steps: [
        { id: 'a', capability: 'search', dependsOn: ['b'] },
        { id: 'b', capability: 'search', dependsOn: ['a'] },
      ],
    }, { planId: 'looping' });

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.kind).toBe('CycleDetected');
    expect(engine.status('looping')).toBeNull();
    expect(engine.list()).toEqual([]);
  });

  it('generates ids and rejects a duplicate caller id', () => {
    const engine = createEngine();
    const first = started(engine, input);
    expect(first.planId).toMatch(/^[0-9a-f-]{36}$/);

    started(engine, input, 'fixed');
    expect(() => engine.start(input, { planId: 'fixed' })).toThrow(ConflictError);
  });

  it('lets observers subscribe before the plan starts', async () => {
    const engine = createEngine();
    const subscription = engine.subscribe('observed');

    const handle = started(engine, input, 'observed');
    const events: StatusEvent[] = [];
    for await (const event of subscription) events.push(event);

    expect(events[0]).toMatchObject({ kind: 'plan', from: 'pending', to: 'running', sequence: 1 });
    expect(events[events.length - 1]).toMatchObject({ kind: 'plan', to: 'succeeded' });
    expect((await handle.done).status).toBe('succeeded');
  });

  it('ends a subscription to a finished plan at once', async () => {
    const engine = createEngine();
    const handle = started(engine, input, 'old');
    await handle.done;

    const subscription = engine.subscribe('old');
    expect(await subscription.next()).toEqual({ value: undefined, done: true });
  });

  it('registers no listener for a finished plan', async () => {
    const engine = createEngine();
    await started(engine, input, 'old').done;
    const handler = vi.fn();

    const unsubscribe = engine.listen('old', handler);

    expect(engine.events.subscriberCount('old')).toBe(0);
    unsubscribe();
    expect(handler).not.toHaveBeenCalled();
  });

  it('delivers to listeners', async () => {
    const engine = createEngine();
    const seen: string[] = [];
    engine.listen('listened', (event) => {
      if (event.kind === 'step') seen.push(`${event.stepId}:${event.to}`);
    });

    await started(engine, input, 'listened').done;
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(seen).toEqual([
      'venue:running',
      'venue:succeeded',
      'book:ready',
      'book:running',
      'book:succeeded',
    ]);
  });

  it('cancels a running plan', async () => {
    const engine = createEngine();
    engine.agents.register('slow', (_params, context) => new Promise((_, reject) => {
      context.signal.addEventListener('abort', () => reject(new Error('stopped')), { once: true });
    }));
    const handle = started(engine, { goal: 'wait', steps: [{ id: 'a', capability: 'slow' }] }, 'to-cancel');

    expect(engine.runningCount).toBe(1);
    expect(engine.cancel('to-cancel')).toBe(true);
    expect(engine.cancel('missing')).toBe(false);

    const snapshot = await handle.done;
    expect(snapshot.status).toBe('cancelled');
    expect(engine.cancel('to-cancel')).toBe(false);
    expect(engine.runningCount).toBe(0);
  });

  it('reports status, list and wait', async () => {
    const engine = createEngine();
    started(engine, input, 'p1');

    expect(engine.status('p1')?.status).toBe('running');
    expect(engine.status('nope')).toBeNull();
    expect(engine.has('p1')).toBe(true);

    const snapshot = await engine.wait('p1');
    expect(snapshot.status).toBe('succeeded');
    expect(engine.list()).toEqual([
      expect.objectContaining({ id: 'p1', goal: 'Plan a team offsite', status: 'succeeded', stepCount: 2 }),
    ]);
    await expect(engine.wait('nope')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('evicts the oldest finished plans', async () => {
    const engine = createEngine({ config: { retainFinishedPlans: 2 } });
    for (const id of ['one', 'two', 'three']) {
      await started(engine, input, id).done;
    }

    expect(engine.list().map((p) => p.id)).toEqual(['two', 'three']);
    expect(engine.status('one')).toBeNull();
  });

  it('keeps plans isolated from each other', async () => {
    const engine = createEngine();
    const a = started(engine, input, 'a');
    const b = started(engine, { goal: 'other', steps: [{ id: 'venue', capability: 'teleport' }] }, 'b');

    const [first, second] = await Promise.all([a.done, b.done]);

    expect(first.status).toBe('succeeded');
    expect(second.status).toBe('failed');
  });

  it('shutdown() cancels whatever is still running', async () => {
    const engine = createEngine({ config: { cancelGraceMs: 10 } });
    engine.agents.register('hang', () => new Promise<never>(() => undefined));
    const handle = started(engine, { goal: 'hang', steps: [{ id: 'a', capability: 'hang' }] });

    await engine.shutdown();

    expect((await handle.done).status).toBe('cancelled');
  });
});
