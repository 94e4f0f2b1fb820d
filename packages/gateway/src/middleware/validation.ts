/**
 * Request validation using Zod
 *
 * Planner output arrives in snake_case (`depends_on`, `timeout_ms`,
 * `max_retries`); API clients tend to send camelCase. Both are accepted
 * and normalized to the core PlanInput shape. Graph-level checks (unknown
 * dependencies, cycles, references) are left to the core validator.
 */

import { z } from 'zod';
import { MAX_TIMER_DELAY_MS, type PlanInput, type PlanStepInput } from '@taskrelay/core';
import { PLAN_MAX_STEPS } from '../config/defaults.js';

// ─── Plan Schemas ────────────────────────────────────────────────

const stepIdSchema = z.string().min(1).max(200);

export const planStepSchema = z.object({
  id: stepIdSchema,
  capability: z.string().min(1).max(100),
  parameters: z.record(z.string(), z.unknown()).optional(),
  depends_on: z.array(stepIdSchema).max(PLAN_MAX_STEPS).optional(),
  dependsOn: z.array(stepIdSchema).max(PLAN_MAX_STEPS).optional(),
  timeout_ms: z.number().int().positive().max(MAX_TIMER_DELAY_MS).optional(),
  timeoutMs: z.number().int().positive().max(MAX_TIMER_DELAY_MS).optional(),
  max_retries: z.number().int().min(0).max(20).optional(),
  maxRetries: z.number().int().min(0).max(20).optional(),
}).transform((raw): PlanStepInput => {
  const step: PlanStepInput = {
    id: raw.id,
    capability: raw.capability,
    parameters: raw.parameters ?? {},
    dependsOn: raw.dependsOn ?? raw.depends_on ?? [],
  };
  const timeoutMs = raw.timeoutMs ?? raw.timeout_ms;
  if (timeoutMs !== undefined) step.timeoutMs = timeoutMs;
  const maxRetries = raw.maxRetries ?? raw.max_retries;
  if (maxRetries !== undefined) step.maxRetries = maxRetries;
  return step;
});

export const planSubmissionSchema = z.object({
  /** Caller-chosen plan id */
  id: z.string().regex(/^[\w-]{1,100}$/, 'Plan id may only contain letters, digits, _ and -').optional(),
  goal: z.string().min(1).max(5000),
  steps: z.array(planStepSchema).max(PLAN_MAX_STEPS),
});

export type PlanSubmission = z.output<typeof planSubmissionSchema>;

/**
 * Split a submission into the core plan input and the optional id.
 */
export function toPlanInput(submission: PlanSubmission): { planId?: string; input: PlanInput } {
  return {
    ...(submission.id !== undefined ? { planId: submission.id } : {}),
    input: { goal: submission.goal, steps: submission.steps },
  };
}

// ─── Validation Helper ──────────────────────────────────────────

export function formatIssues(issues: ReadonlyArray<{ path: PropertyKey[]; message: string }>): string {
  return issues.map(i => `${i.path.map(String).join('.') || '(root)'}: ${i.message}`).join('; ');
}

/**
 * Validate request body against a Zod schema.
 * Returns parsed data on success, throws descriptive error on failure.
 */
export function validateBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new Error(`Validation failed: ${formatIssues(result.error.issues)}`);
  }
  return result.data;
}
