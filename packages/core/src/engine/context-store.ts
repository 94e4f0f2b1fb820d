/**
 * Context Store
 *
 * Write-once table of step results for one plan. Dependents read from it
 * while resolving parameters; the scheduler only readies a dependent after
 * the put() for its dependencies has happened, so no locking is needed.
 */

import { DuplicateWriteError, NotFoundError } from '../types/errors.js';

export class ContextStore {
  private readonly values = new Map<string, unknown>();

  constructor(readonly planId: string) {}

  /**
   * Record a step's result. A second write for the same step is a bug.
   */
  put(stepId: string, value: unknown): void {
    if (this.values.has(stepId)) {
      throw new DuplicateWriteError(stepId);
    }
    this.values.set(stepId, value);
  }

  get(stepId: string): unknown {
    if (!this.values.has(stepId)) {
      throw new NotFoundError('Step result', stepId);
    }
    return this.values.get(stepId);
  }

  has(stepId: string): boolean {
    return this.values.has(stepId);
  }

  get size(): number {
    return this.values.size;
  }

  entries(): Array<[string, unknown]> {
    return [...this.values.entries()];
  }

  /** Drop every entry once the plan is terminal */
  clear(): void {
    this.values.clear();
  }
}
