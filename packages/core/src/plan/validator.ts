/**
 * Step Graph Validator
 *
 * Checks a planner-produced plan before anything runs:
 *   0. unique step ids, well-formed references
 *   1. every dependency exists
 *   2. no dependency cycle
 *   3. every reference targets a transitive dependency
 *
 * Pure: no ids, clocks, stores or events are touched.
 */

import type {
  ParameterTemplate,
  PlanInput,
  StepReference,
  ValidatedPlan,
  ValidatedStep,
} from './types.js';
import { collectReferences, compileParameters, formatReference } from './references.js';
import { PlanValidationError } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';

interface StepDraft {
  id: string;
  capability: string;
  rawParameters: Record<string, unknown>;
  parameters: Record<string, ParameterTemplate>;
  references: StepReference[];
  dependsOn: string[];
  timeoutMs?: number;
  maxRetries?: number;
}

// ============================================================================
// Graph helpers
// ============================================================================

/**
 * Depth-first search for a cycle. Returns the closed id path of the first
 * cycle found (e.g. ['a', 'b', 'a']) or null.
 */
export function findCycle(
  ids: readonly string[],
  dependencies: ReadonlyMap<string, readonly string[]>,
): string[] | null {
  const state = new Map<string, 'visiting' | 'done'>();
  const stack: string[] = [];

  const visit = (id: string): string[] | null => {
    state.set(id, 'visiting');
    stack.push(id);
    for (const dep of dependencies.get(id) ?? []) {
      const depState = state.get(dep);
      if (depState === 'visiting') {
        return [...stack.slice(stack.indexOf(dep)), dep];
      }
      if (depState === undefined) {
        const cycle = visit(dep);
        if (cycle) return cycle;
      }
    }
    stack.pop();
    state.set(id, 'done');
    return null;
  };

  for (const id of ids) {
    if (state.has(id)) continue;
    const cycle = visit(id);
    if (cycle) return cycle;
  }
  return null;
}

/**
 * Kahn's algorithm over an acyclic graph; ids with no remaining
 * dependencies are released in input order.
 */
export function topologicalOrder(
  ids: readonly string[],
  dependencies: ReadonlyMap<string, readonly string[]>,
  dependents: ReadonlyMap<string, readonly string[]>,
): string[] {
  const remaining = new Map<string, number>();
  for (const id of ids) {
    remaining.set(id, dependencies.get(id)?.length ?? 0);
  }

  const order: string[] = [];
  const queue = ids.filter((id) => remaining.get(id) === 0);
  while (queue.length > 0) {
    const id = queue.shift();
    if (id === undefined) break;
    order.push(id);
    for (const next of dependents.get(id) ?? []) {
      const left = (remaining.get(next) ?? 1) - 1;
      remaining.set(next, left);
      if (left === 0) queue.push(next);
    }
  }
  return order;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Validate a plan and seed readiness. Checks run in a fixed order and the
 * first failure is returned.
 */
export function validatePlan(input: PlanInput): Result<ValidatedPlan, PlanValidationError> {
  const drafts: StepDraft[] = [];
  const seen = new Set<string>();

  // 0. Structure
  for (const step of input.steps) {
    if (seen.has(step.id)) {
      return err(new PlanValidationError(
        'DuplicateStepId',
        `Step id '${step.id}' is used more than once`,
        { stepId: step.id },
      ));
    }
    seen.add(step.id);

    const rawParameters = step.parameters ?? {};
    const compiled = compileParameters(rawParameters);
    if (!compiled.ok) {
      return err(new PlanValidationError(
        'MalformedReference',
        `Step '${step.id}' parameter '${compiled.error.parameter}': ${compiled.error.reason}`,
        { stepId: step.id, parameter: compiled.error.parameter },
      ));
    }

    drafts.push({
      id: step.id,
      capability: step.capability,
      rawParameters,
      parameters: compiled.value,
      references: collectReferences(compiled.value),
      dependsOn: [...new Set(step.dependsOn ?? [])],
      timeoutMs: step.timeoutMs,
      maxRetries: step.maxRetries,
    });
  }

  // 1. Unknown dependencies
  for (const draft of drafts) {
    for (const dep of draft.dependsOn) {
      if (!seen.has(dep)) {
        return err(new PlanValidationError(
          'UnknownDependency',
          `Step '${draft.id}' depends on unknown step '${dep}'`,
          { stepId: draft.id, dependencyId: dep },
        ));
      }
    }
  }

  const ids = drafts.map((d) => d.id);
  const dependencies = new Map<string, readonly string[]>(drafts.map((d) => [d.id, d.dependsOn]));
  const dependents = new Map<string, string[]>(ids.map((id) => [id, []]));
  for (const draft of drafts) {
    for (const dep of draft.dependsOn) {
      dependents.get(dep)?.push(draft.id);
    }
  }

  // 2. Cycles
  const cycle = findCycle(ids, dependencies);
  if (cycle) {
    return err(new PlanValidationError(
      'CycleDetected',
      `Dependency cycle: ${cycle.join(' -> ')}`,
      { stepId: cycle[0], cycle },
    ));
  }

  // 3. References must point at transitive dependencies
  const order = topologicalOrder(ids, dependencies, dependents);
  const ancestors = new Map<string, Set<string>>();
  for (const id of order) {
    const set = new Set<string>();
    for (const dep of dependencies.get(id) ?? []) {
      set.add(dep);
      for (const a of ancestors.get(dep) ?? []) set.add(a);
    }
    ancestors.set(id, set);
  }

  for (const draft of drafts) {
    const reachable = ancestors.get(draft.id);
    for (const reference of draft.references) {
      if (!reachable?.has(reference.stepId)) {
        return err(new PlanValidationError(
          'UnresolvableReference',
          `Step '${draft.id}' references '${formatReference(reference)}' ` +
          `but '${reference.stepId}' is not one of its dependencies`,
          { stepId: draft.id, reference },
        ));
      }
    }
  }

  const steps: ValidatedStep[] = drafts.map((draft) => ({
    id: draft.id,
    capability: draft.capability,
    rawParameters: draft.rawParameters,
    parameters: draft.parameters,
    references: draft.references,
    dependsOn: draft.dependsOn,
    dependents: dependents.get(draft.id) ?? [],
    initialStatus: draft.dependsOn.length === 0 ? 'ready' : 'pending',
    ...(draft.timeoutMs !== undefined ? { timeoutMs: draft.timeoutMs } : {}),
    ...(draft.maxRetries !== undefined ? { maxRetries: draft.maxRetries } : {}),
  }));

  return ok({ goal: input.goal, steps, order });
}
