import { describe, it, expect } from 'vitest';
import { validatePlan, findCycle, topologicalOrder } from './validator.js';
import type { PlanInput, PlanStepInput, ValidatedPlan } from './types.js';
import type { PlanValidationError } from '../types/errors.js';

function plan(steps: PlanStepInput[]): PlanInput {
  return { goal: 'test goal', steps };
}

function expectValid(input: PlanInput): ValidatedPlan {
  const result = validatePlan(input);
  if (!result.ok) throw new Error(`expected a valid plan: ${result.error.message}`);
  return result.value;
}

function expectInvalid(input: PlanInput): PlanValidationError {
  const result = validatePlan(input);
  if (result.ok) throw new Error('expected validation to fail');
  return result.error;
}

/** Deterministic PRNG so generated graphs are reproducible */
function lcg(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

/** Random DAG: edges only point from later to earlier steps */
function randomDag(size: number, random: () => number): PlanStepInput[] {
  const steps: PlanStepInput[] = [];
  for (let i = 0; i < size; i++) {
    const dependsOn: string[] = [];
    for (let j = 0; j < i; j++) {
      if (random() < 0.3) dependsOn.push(`s${j}`);
    }
    steps.push({ id: `s${i}`, capability: 'search', dependsOn });
  }
  return steps;
}

describe('validatePlan', () => {
  describe('valid plans', () => {
    it('seeds readiness and builds the dependents index', () => {
      const validated = expectValid(plan([
        { id: 'A', capability: 'search' },
        { id: 'B', capability: 'calendar', dependsOn: ['A'] },
        { id: 'C', capability: 'messaging', dependsOn: ['B'] },
      ]));

      expect(validated.goal).toBe('test goal');
      expect(validated.order).toEqual(['A', 'B', 'C']);
      expect(validated.steps.map((s) => [s.id, s.initialStatus, s.dependents])).toEqual([
        ['A', 'ready', ['B']],
        ['B', 'pending', ['C']],
        ['C', 'pending', []],
      ]);
    });

    it('accepts an empty plan', () => {
      const validated = expectValid(plan([]));
      expect(validated.steps).toEqual([]);
      expect(validated.order).toEqual([]);
    });

    it('deduplicates dependencies', () => {
      const validated = expectValid(plan([
        { id: 'A', capability: 'search' },
        { id: 'B', capability: 'search', dependsOn: ['A', 'A'] },
      ]));
      expect(validated.steps[1]?.dependsOn).toEqual(['A']);
      expect(validated.steps[0]?.dependents).toEqual(['B']);
    });

    it('allows references to transitive dependencies', () => {
      const validated = expectValid(plan([
        { id: 'A', capability: 'search' },
        { id: 'B', capability: 'calendar', dependsOn: ['A'] },
        { id: 'C', capability: 'messaging', dependsOn: ['B'], parameters: { text: '{{A.title}}' } },
      ]));
      expect(validated.steps[2]?.references).toEqual([{ stepId: 'A', path: ['title'] }]);
    });

    it('keeps per-step overrides', () => {
      const validated = expectValid(plan([
        { id: 'A', capability: 'search', timeoutMs: 250, maxRetries: 0 },
      ]));
      expect(validated.steps[0]).toMatchObject({ timeoutMs: 250, maxRetries: 0 });
    });

    it('seeds exactly the dependency-free steps as ready for any acyclic graph', () => {
      const random = lcg(7);
      for (let round = 0; round < 50; round++) {
        const steps = randomDag(1 + Math.floor(random() * 12), random);
        const validated = expectValid(plan(steps));

        const ready = validated.steps.filter((s) => s.initialStatus === 'ready').map((s) => s.id);
        const roots = steps.filter((s) => (s.dependsOn ?? []).length === 0).map((s) => s.id);
        expect(ready).toEqual(roots);
        expect(validated.order).toHaveLength(steps.length);
      }
    });

    it('produces an order where every dependency comes first', () => {
      const random = lcg(11);
      const steps = randomDag(15, random);
      const validated = expectValid(plan(steps));
      const position = new Map(validated.order.map((id, i) => [id, i]));
      for (const step of steps) {
        for (const dep of step.dependsOn ?? []) {
          expect(position.get(dep)).toBeLessThan(position.get(step.id) ?? -1);
        }
      }
    });
  });

  describe('DuplicateStepId', () => {
    it('rejects a repeated id', () => {
      const error = expectInvalid(plan([
        { id: 'A', capability: 'search' },
        { id: 'A', capability: 'calendar' },
      ]));
      expect(error.kind).toBe('DuplicateStepId');
      expect(error.message).toBe("Step id 'A' is used more than once");
      expect(error.details).toEqual({ stepId: 'A' });
    });
  });

  describe('MalformedReference', () => {
    it('rejects a bad placeholder before looking at dependencies', () => {
      const error = expectInvalid(plan([
        { id: 'A', capability: 'search', dependsOn: ['missing'], parameters: { q: '{{}}' } },
      ]));
      expect(error.kind).toBe('MalformedReference');
      expect(error.message).toBe("Step 'A' parameter 'q': invalid placeholder '{{}}'");
      expect(error.details).toEqual({ stepId: 'A', parameter: 'q' });
    });
  });

  describe('UnknownDependency', () => {
    it('names the step and the missing dependency', () => {
      const error = expectInvalid(plan([
        { id: 'A', capability: 'search' },
        { id: 'B', capability: 'calendar', dependsOn: ['Z'] },
      ]));
      expect(error.kind).toBe('UnknownDependency');
      expect(error.message).toBe("Step 'B' depends on unknown step 'Z'");
      expect(error.details).toEqual({ stepId: 'B', dependencyId: 'Z' });
    });

    it('is reported before a cycle', () => {
      const error = expectInvalid(plan([
        { id: 'A', capability: 'search', dependsOn: ['B'] },
        { id: 'B', capability: 'search', dependsOn: ['A', 'Z'] },
      ]));
      expect(error.kind).toBe('UnknownDependency');
    });
  });

  describe('CycleDetected', () => {
    it('reports the cycle as a closed path', () => {
      const error = expectInvalid(plan([
        { id: 'A', capability: 'search', dependsOn: ['B'] },
        { id: 'B', capability: 'search', dependsOn: ['A'] },
      ]));
      expect(error.kind).toBe('CycleDetected');
      expect(error.message).toBe('Dependency cycle: A -> B -> A');
      expect(error.details).toEqual({ stepId: 'A', cycle: ['A', 'B', 'A'] });
    });

    it('treats a self-dependency as a cycle', () => {
      const error = expectInvalid(plan([{ id: 'A', capability: 'search', dependsOn: ['A'] }]));
      expect(error.kind).toBe('CycleDetected');
      expect(error.details.cycle).toEqual(['A', 'A']);
    });

    it('finds a cycle behind an acyclic prefix', () => {
      const error = expectInvalid(plan([
        { id: 'root', capability: 'search' },
        { id: 'x', capability: 'search', dependsOn: ['root', 'z'] },
        { id: 'y', capability: 'search', dependsOn: ['x'] },
        { id: 'z', capability: 'search', dependsOn: ['y'] },
      ]));
      expect(error.details.cycle).toEqual(['x', 'z', 'y', 'x']);
    });
  });

  describe('UnresolvableReference', () => {
    it('rejects a reference to a step that is not a dependency', () => {
      const error = expectInvalid(plan([
        { id: 'A', capability: 'search' },
        { id: 'B', capability: 'calendar', parameters: { when: '{{A.date}}' } },
      ]));
      expect(error.kind).toBe('UnresolvableReference');
      expect(error.message).toBe("Step 'B' references 'A.date' but 'A' is not one of its dependencies");
      expect(error.details).toEqual({ stepId: 'B', reference: { stepId: 'A', path: ['date'] } });
    });

    it('checks references nested under a __proto__ parameter', () => {
      const parameters: Record<string, unknown> = JSON.parse('{"__proto__": {"when": "{{A.date}}"}}');
      const error = expectInvalid(plan([
        { id: 'A', capability: 'search' },
        { id: 'B', capability: 'calendar', parameters },
      ]));
      expect(error.kind).toBe('UnresolvableReference');
      expect(error.message).toBe("Step 'B' references 'A.date' but 'A' is not one of its dependencies");
    });

    it('rejects a step referencing itself', () => {
      const error = expectInvalid(plan([
        { id: 'A', capability: 'search', parameters: { q: { $ref: 'A' } } },
      ]));
      expect(error.kind).toBe('UnresolvableReference');
    });

    it('rejects a reference to a step that does not exist', () => {
      const error = expectInvalid(plan([
        { id: 'A', capability: 'search', parameters: { q: '{{ghost}}' } },
      ]));
      expect(error.kind).toBe('UnresolvableReference');
      expect(error.details.reference).toEqual({ stepId: 'ghost', path: [] });
    });
  });
});

describe('findCycle', () => {
  it('returns null for an acyclic graph', () => {
    const deps = new Map<string, string[]>([['a', []], ['b', ['a']]]);
    expect(findCycle(['a', 'b'], deps)).toBeNull();
  });

  it('always finds a cycle when one edge closes a chain', () => {
    const random = lcg(3);
    for (let round = 0; round < 30; round++) {
      const steps = randomDag(2 + Math.floor(random() * 10), random);
      const last = steps[steps.length - 1];
      const first = steps[0];
      if (!last || !first) continue;
      // Chain every step to its predecessor, then close the loop
      steps.forEach((step, i) => {
        if (i > 0) step.dependsOn = [...new Set([...(step.dependsOn ?? []), `s${i - 1}`])];
      });
      first.dependsOn = [last.id];

      const error = expectInvalid(plan(steps));
      expect(error.kind).toBe('CycleDetected');
      const cycle = error.details.cycle ?? [];
      expect(cycle[0]).toBe(cycle[cycle.length - 1]);
    }
  });
});

describe('topologicalOrder', () => {
  it('releases independent steps in input order', () => {
    const deps = new Map<string, string[]>([['c', []], ['a', []], ['b', ['c']]]);
    const dependents = new Map<string, string[]>([['c', ['b']], ['a', []], ['b', []]]);
    expect(topologicalOrder(['c', 'a', 'b'], deps, dependents)).toEqual(['c', 'a', 'b']);
  });
});
