import { describe, it, expect } from 'vitest';
import { planSubmissionSchema, toPlanInput, validateBody, formatIssues } from './validation.js';

describe('planSubmissionSchema', () => {
  it('normalizes snake_case planner fields', () => {
    const parsed = validateBody(planSubmissionSchema, {
      goal: 'Plan a meeting',
      steps: [
        { id: 'find', capability: 'calendar', parameters: { action: 'free slots' } },
        {
          id: 'invite',
          capability: 'messaging',
          parameters: { when: '{{find.slot}}' },
          depends_on: ['find'],
          timeout_ms: 2000,
          max_retries: 1,
        },
      ],
    });

    expect(parsed.steps).toEqual([
      { id: 'find', capability: 'calendar', parameters: { action: 'free slots' }, dependsOn: [] },
      {
        id: 'invite',
        capability: 'messaging',
        parameters: { when: '{{find.slot}}' },
        dependsOn: ['find'],
        timeoutMs: 2000,
        maxRetries: 1,
      },
    ]);
  });

  it('prefers camelCase when both spellings are present', () => {
    const parsed = validateBody(planSubmissionSchema, {
      goal: 'g',
      steps: [{ id: 'a', capability: 'search', dependsOn: [], depends_on: ['x'], timeoutMs: 5, timeout_ms: 9 }],
    });

    expect(parsed.steps[0]).toEqual({
      id: 'a',
      capability: 'search',
      parameters: {},
      dependsOn: [],
      timeoutMs: 5,
    });
  });

  it('rejects negative retry budgets and non-integer timeouts', () => {
    expect(() =>
      validateBody(planSubmissionSchema, {
        goal: 'g',
        steps: [{ id: 'a', capability: 'search', max_retries: -1 }],
      })
    ).toThrow('Validation failed: steps.0.max_retries: Number must be greater than or equal to 0');

    expect(() =>
      validateBody(planSubmissionSchema, {
        goal: 'g',
        steps: [{ id: 'a', capability: 'search', timeoutMs: 1.5 }],
      })
    ).toThrow('Validation failed: steps.0.timeoutMs: Expected integer, received float');
  });

  it('rejects timeouts longer than a timer can wait', () => {
    expect(() =>
      validateBody(planSubmissionSchema, {
        goal: 'g',
        steps: [{ id: 'a', capability: 'search', timeout_ms: 3_000_000_000 }],
      })
    ).toThrow('Validation failed: steps.0.timeout_ms: Number must be less than or equal to 2147483647');
  });

  it('rejects plan ids with unsafe characters', () => {
    const result = planSubmissionSchema.safeParse({ id: 'a/b', goal: 'g', steps: [] });
    expect(result.success).toBe(false);
  });
});

describe('toPlanInput', () => {
  it('splits off the caller-chosen id', () => {
    const submission = validateBody(planSubmissionSchema, { id: 'trip-1', goal: 'Travel', steps: [] });
    expect(toPlanInput(submission)).toEqual({ planId: 'trip-1', input: { goal: 'Travel', steps: [] } });
  });

  it('leaves planId out when none was sent', () => {
    const submission = validateBody(planSubmissionSchema, { goal: 'Travel', steps: [] });
    expect(toPlanInput(submission)).toEqual({ input: { goal: 'Travel', steps: [] } });
  });
});

describe('formatIssues', () => {
  it('joins issue paths and labels root issues', () => {
    expect(
      formatIssues([
        { path: ['steps', 0, 'id'], message: 'Required' },
        { path: [], message: 'Expected object, received string' },
      ])
    ).toBe('steps.0.id: Required; (root): Expected object, received string');
  });
});
