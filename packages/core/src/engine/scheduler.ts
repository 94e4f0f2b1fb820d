/**
 * Plan Scheduler
 *
 * Drives one validated plan to a terminal state. All status changes happen
 * in synchronous methods of this class, so two agent outcomes can never
 * interleave halfway through a transition.
 *
 * Step lifecycle:
 *   pending → ready → running → succeeded
 *                             → pending (transient failure, retry after backoff)
 *                             → failed  (dependents cascade to skipped)
 *                             → cancelled
 *   ready → failed when the capability is unknown or a reference cannot be resolved
 */

import type {
  PlanSnapshot,
  PlanStatus,
  StepErrorDescriptor,
  StepSnapshot,
  StepStatus,
  ValidatedPlan,
  ValidatedStep,
} from '../plan/types.js';
import { isTerminalPlanStatus, isTerminalStepStatus } from '../plan/types.js';
import type { RetrySummary } from '../events/types.js';
import type { PlanEventBus } from '../events/plan-event-bus.js';
import type { AgentRegistry } from '../agents/registry.js';
import type { AgentContext, RegisteredCapability } from '../agents/types.js';
import { clampTimerDelay, type EngineConfig } from './config.js';
import { ContextStore } from './context-store.js';
import { ReadyQueue } from './ready-queue.js';
import { backoffDelay, classifyFailure } from './failure.js';
import { resolveParameters } from '../plan/references.js';
import { DuplicateWriteError, TimeoutError, getErrorMessage, isAppError } from '../types/errors.js';
import { getLog } from '../services/get-log.js';

export interface SchedulerOptions {
  planId: string;
  plan: ValidatedPlan;
  agents: AgentRegistry;
  events: PlanEventBus;
  config: EngineConfig;
  /** Source of jitter; tests pass a constant */
  random?: () => number;
  /** Called once, right after the final plan event */
  onFinished?: (scheduler: PlanScheduler) => void;
}

interface StepState {
  readonly step: ValidatedStep;
  status: StepStatus;
  retryCount: number;
  result?: unknown;
  error?: StepErrorDescriptor;
  startedAt?: string;
  finishedAt?: string;
  backoffTimer?: ReturnType<typeof setTimeout>;
}

/** One agent call in flight */
interface Attempt {
  readonly controller: AbortController;
  readonly registered: RegisteredCapability;
  /** Stop waiting for the agent; its eventual outcome is ignored */
  readonly release: (reason: unknown) => void;
}

type AttemptOutcome = { ok: true; value: unknown } | { ok: false; error: unknown };

interface TransitionDetails {
  error?: StepErrorDescriptor;
  retry?: RetrySummary;
}

function now(): string {
  return new Date().toISOString();
}

/**
 * Run fn with a deadline. On timeout the controller is aborted with the
 * TimeoutError and the returned promise rejects with it, whether or not
 * the agent honours the signal.
 */
function executeWithTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  controller: AbortController,
  operation: string,
): { promise: Promise<T>; release: (reason: unknown) => void } {
  let settled = false;
  let release: (reason: unknown) => void = () => undefined;

  const promise = new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      if (!settled) {
        settled = true;
        const error = new TimeoutError(operation, timeoutMs);
        controller.abort(error);
        reject(error);
      }
    }, timeoutMs);

    release = (reason) => {
      if (!settled) {
        settled = true;
        clearTimeout(timer);
        reject(reason);
      }
    };

    let call: Promise<T>;
    try {
      call = fn();
    } catch (error) {
      call = Promise.reject(error);
    }

    call
      .then((result) => {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          resolve(result);
        }
      })
      .catch((error: unknown) => {
        if (!settled) {
          settled = true;
          clearTimeout(timer);
          reject(error);
        }
      });
  });

  return { promise, release };
}

export class PlanScheduler {
  readonly planId: string;
  readonly done: Promise<PlanSnapshot>;

  private readonly plan: ValidatedPlan;
  private readonly agents: AgentRegistry;
  private readonly events: PlanEventBus;
  private readonly config: EngineConfig;
  private readonly random: () => number;
  private readonly onFinished?: (scheduler: PlanScheduler) => void;
  private readonly log = getLog('Scheduler');

  private readonly steps = new Map<string, StepState>();
  private readonly queue = new ReadyQueue();
  private readonly active = new Map<string, Attempt>();
  private readonly context: ContextStore;

  private status: PlanStatus = 'pending';
  private readonly createdAt = now();
  private startedAt?: string;
  private finishedAt?: string;
  private cancelRequested = false;
  private sequence = 0;
  private graceTimer?: ReturnType<typeof setTimeout>;
  private fault?: Error;

  private resolveDone: (snapshot: PlanSnapshot) => void = () => undefined;
  private rejectDone: (error: Error) => void = () => undefined;

  constructor(options: SchedulerOptions) {
    this.planId = options.planId;
    this.plan = options.plan;
    this.agents = options.agents;
    this.events = options.events;
    this.config = options.config;
    this.random = options.random ?? Math.random;
    this.onFinished = options.onFinished;
    this.context = new ContextStore(options.planId);

    for (const step of options.plan.steps) {
      this.steps.set(step.id, { step, status: step.initialStatus, retryCount: 0 });
    }

    this.done = new Promise<PlanSnapshot>((resolve, reject) => {
      this.resolveDone = resolve;
      this.rejectDone = reject;
    });
  }

  get planStatus(): PlanStatus {
    return this.status;
  }

  get isFinished(): boolean {
    return isTerminalPlanStatus(this.status);
  }

  // ==========================================================================
  // Control
  // ==========================================================================

  /**
   * Begin dispatching. Calling it twice has no effect.
   */
  start(): Promise<PlanSnapshot> {
    if (this.status !== 'pending') return this.done;

    this.startedAt = now();
    this.transitionPlan('running');
    this.log.info('Plan started', {
      planId: this.planId,
      goal: this.plan.goal,
      steps: this.plan.steps.length,
    });

    this.queue.enqueueBatch(
      this.plan.steps.filter((s) => s.initialStatus === 'ready').map((s) => s.id),
    );
    this.pump();
    return this.done;
  }

  /**
   * Request cancellation. Returns false unless the plan is running and no
   * cancel is already under way.
   */
  cancel(): boolean {
    const accepted = this.beginCancel('Plan cancelled');
    if (accepted) this.pump();
    return accepted;
  }

  snapshot(): PlanSnapshot {
    const counts: Record<StepStatus, number> = {
      pending: 0,
      ready: 0,
      running: 0,
      succeeded: 0,
      failed: 0,
      skipped: 0,
      cancelled: 0,
    };
    const steps: StepSnapshot[] = [];
    for (const state of this.steps.values()) {
      counts[state.status] += 1;
      steps.push({
        id: state.step.id,
        capability: state.step.capability,
        dependsOn: state.step.dependsOn,
        status: state.status,
        retryCount: state.retryCount,
        ...(state.status === 'succeeded' ? { result: state.result } : {}),
        ...(state.error ? { error: state.error } : {}),
        ...(state.startedAt ? { startedAt: state.startedAt } : {}),
        ...(state.finishedAt ? { finishedAt: state.finishedAt } : {}),
      });
    }

    return {
      id: this.planId,
      goal: this.plan.goal,
      status: this.status,
      createdAt: this.createdAt,
      ...(this.startedAt ? { startedAt: this.startedAt } : {}),
      ...(this.finishedAt ? { finishedAt: this.finishedAt } : {}),
      cancelRequested: this.cancelRequested,
      steps,
      counts,
    };
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  /**
   * Fill free worker slots from the ready queue, then see whether the plan
   * is done. Every entry point that changes state ends here.
   */
  private pump(): void {
    while (!this.cancelRequested && this.active.size < this.config.maxConcurrentSteps) {
      const stepId = this.queue.shift();
      if (stepId === undefined) break;
      const state = this.steps.get(stepId);
      if (!state || state.status !== 'ready' || this.active.has(stepId)) continue;
      this.dispatch(state);
    }
    this.checkCompletion();
  }

  private dispatch(state: StepState): void {
    const { step } = state;

    const registered = this.agents.get(step.capability);
    if (!registered) {
      this.failStep(state, {
        code: 'UNKNOWN_CAPABILITY',
        message: `No agent registered for capability '${step.capability}'`,
        transient: false,
      });
      return;
    }

    let parameters: Record<string, unknown>;
    try {
      parameters = resolveParameters(step.parameters, (id) => this.context.get(id));
    } catch (error) {
      this.failStep(state, {
        code: isAppError(error) ? error.code : 'REFERENCE_UNRESOLVED',
        message: getErrorMessage(error),
        transient: false,
      });
      return;
    }

    const timeoutMs = clampTimerDelay(step.timeoutMs ?? registered.timeoutMs ?? this.config.stepTimeoutMs);
    const controller = new AbortController();
    const context: AgentContext = {
      planId: this.planId,
      stepId: step.id,
      capability: step.capability,
      attempt: state.retryCount + 1,
      deadline: Date.now() + timeoutMs,
      timeoutMs,
      signal: controller.signal,
    };

    state.startedAt ??= now();
    this.transitionStep(state, 'running');

    const { promise, release } = executeWithTimeout(
      () => registered.agent.execute(parameters, context),
      timeoutMs,
      controller,
      `${step.capability} step '${step.id}'`,
    );
    const attempt: Attempt = { controller, registered, release };
    this.active.set(step.id, attempt);

    promise
      .then(
        (value): AttemptOutcome => ({ ok: true, value }),
        (error: unknown): AttemptOutcome => ({ ok: false, error }),
      )
      .then((outcome) => this.onAttemptSettled(state, attempt, outcome))
      .catch((error: unknown) => this.onFault(error));
  }

  private onAttemptSettled(state: StepState, attempt: Attempt, outcome: AttemptOutcome): void {
    // Released after the cancel grace period: the step is already cancelled
    if (this.active.get(state.step.id) !== attempt) return;
    this.active.delete(state.step.id);
    if (state.status !== 'running') return;

    if (outcome.ok) {
      this.completeStep(state, outcome.value);
    } else if (this.cancelRequested) {
      this.cancelStep(state, 'Step stopped after plan cancellation');
    } else {
      this.handleFailure(state, outcome.error, attempt.registered.retryOnTimeout);
    }
    this.pump();
  }

  // ==========================================================================
  // Outcomes
  // ==========================================================================

  private completeStep(state: StepState, value: unknown): void {
    try {
      this.context.put(state.step.id, value);
    } catch (error) {
      if (!(error instanceof DuplicateWriteError)) throw error;
      this.log.error('Step result written twice', { planId: this.planId, stepId: state.step.id });
      if (this.config.strictConsistency) {
        // Terminal before the fault cancels everything still open
        this.failStep(state, { code: error.code, message: error.message, transient: false });
        this.onFault(error);
        return;
      }
    }

    state.result = value;
    state.error = undefined;
    state.finishedAt = now();
    this.transitionStep(state, 'succeeded');

    if (!this.cancelRequested) {
      this.readyDependents(state);
    }
  }

  private readyDependents(state: StepState): void {
    const readied: string[] = [];
    for (const dependentId of state.step.dependents) {
      const dependent = this.steps.get(dependentId);
      if (!dependent || dependent.status !== 'pending' || dependent.backoffTimer) continue;
      const satisfied = dependent.step.dependsOn.every(
        (dep) => this.steps.get(dep)?.status === 'succeeded',
      );
      if (satisfied) readied.push(dependentId);
    }

    readied.sort();
    for (const id of readied) {
      const dependent = this.steps.get(id);
      if (dependent) this.transitionStep(dependent, 'ready');
    }
    this.queue.enqueueBatch(readied);
  }

  private handleFailure(state: StepState, error: unknown, retryOnTimeout: boolean): void {
    const { transient, descriptor } = classifyFailure(error, { retryOnTimeout });
    const maxRetries = state.step.maxRetries ?? this.config.maxRetries;

    if (transient && state.retryCount < maxRetries) {
      this.scheduleRetry(state, descriptor, maxRetries);
      return;
    }

    this.failStep(state, transient && state.retryCount > 0
      ? { ...descriptor, message: `${descriptor.message} (gave up after ${state.retryCount} retries)` }
      : descriptor);
  }

  private scheduleRetry(state: StepState, descriptor: StepErrorDescriptor, maxRetries: number): void {
    const delayMs = backoffDelay(state.retryCount, this.config.backoff, this.random);
    state.retryCount += 1;
    state.error = descriptor;

    this.transitionStep(state, 'pending', {
      error: descriptor,
      retry: { attempt: state.retryCount, maxRetries, delayMs },
    });
    this.log.warn('Step failed, retrying', {
      planId: this.planId,
      stepId: state.step.id,
      attempt: state.retryCount,
      maxRetries,
      delayMs,
      error: descriptor.message,
    });

    state.backoffTimer = setTimeout(() => {
      state.backoffTimer = undefined;
      if (this.cancelRequested || state.status !== 'pending') return;
      this.transitionStep(state, 'ready');
      this.queue.enqueueBatch([state.step.id]);
      this.pump();
    }, delayMs);
  }

  private failStep(state: StepState, descriptor: StepErrorDescriptor): void {
    state.error = descriptor;
    state.finishedAt = now();
    this.transitionStep(state, 'failed', { error: descriptor });
    this.log.warn('Step failed', {
      planId: this.planId,
      stepId: state.step.id,
      code: descriptor.code,
      error: descriptor.message,
    });

    const skipped = this.cascadeSkip(state);
    if (skipped > 0) {
      this.log.info('Skipped dependents of failed step', {
        planId: this.planId,
        stepId: state.step.id,
        skipped,
      });
    }

    if (this.config.failurePolicy === 'fail-fast') {
      this.beginCancel(`Cancelled after step '${state.step.id}' failed`);
    }
  }

  /**
   * Skip every transitive dependent of a failed step, breadth first with
   * each level in id order.
   */
  private cascadeSkip(failed: StepState): number {
    const descriptor: StepErrorDescriptor = {
      code: 'DEPENDENCY_FAILED',
      message: `Dependency '${failed.step.id}' failed`,
      transient: false,
    };

    let skipped = 0;
    let frontier = [...failed.step.dependents].sort();
    while (frontier.length > 0) {
      const next = new Set<string>();
      for (const id of frontier) {
        const state = this.steps.get(id);
        if (!state || isTerminalStepStatus(state.status)) continue;
        this.clearBackoff(state);
        this.queue.remove(id);
        state.error = descriptor;
        state.finishedAt = now();
        this.transitionStep(state, 'skipped', { error: descriptor });
        skipped++;
        for (const dependent of state.step.dependents) next.add(dependent);
      }
      frontier = [...next].sort();
    }
    return skipped;
  }

  private cancelStep(state: StepState, message: string): void {
    this.clearBackoff(state);
    this.queue.remove(state.step.id);
    state.error = { code: 'CANCELLED', message, transient: false };
    state.finishedAt = now();
    this.transitionStep(state, 'cancelled', { error: state.error });
  }

  private clearBackoff(state: StepState): void {
    if (state.backoffTimer) {
      clearTimeout(state.backoffTimer);
      state.backoffTimer = undefined;
    }
  }

  // ==========================================================================
  // Cancellation
  // ==========================================================================

  private beginCancel(reason: string): boolean {
    if (this.cancelRequested || this.status !== 'running') return false;
    this.cancelRequested = true;
    this.log.info('Cancelling plan', {
      planId: this.planId,
      reason,
      inFlight: this.active.size,
    });

    const waiting = [...this.steps.values()]
      .filter((s) => !isTerminalStepStatus(s.status) && !this.active.has(s.step.id))
      .sort((a, b) => (a.step.id < b.step.id ? -1 : a.step.id > b.step.id ? 1 : 0));
    for (const state of waiting) {
      this.cancelStep(state, reason);
    }
    this.queue.drain();

    if (this.active.size > 0) {
      for (const attempt of this.active.values()) {
        attempt.controller.abort(new Error(reason));
      }
      this.graceTimer = setTimeout(() => this.expireGrace(), this.config.cancelGraceMs);
    }
    return true;
  }

  /**
   * Steps still running after the grace period are cancelled without
   * waiting for their agents.
   */
  private expireGrace(): void {
    this.graceTimer = undefined;
    const stragglers = [...this.active.keys()].sort();
    for (const stepId of stragglers) {
      const attempt = this.active.get(stepId);
      const state = this.steps.get(stepId);
      this.active.delete(stepId);
      attempt?.release(new Error('Cancellation grace period expired'));
      if (state && state.status === 'running') {
        this.cancelStep(state, 'Step did not stop within the cancellation grace period');
      }
    }
    if (stragglers.length > 0) {
      this.log.warn('Cancelled steps that ignored the abort signal', {
        planId: this.planId,
        steps: stragglers,
      });
    }
    this.pump();
  }

  // ==========================================================================
  // Completion
  // ==========================================================================

  private checkCompletion(): void {
    if (this.status !== 'running' || this.active.size > 0) return;
    for (const state of this.steps.values()) {
      if (!isTerminalStepStatus(state.status)) return;
    }
    this.finish();
  }

  private finish(): void {
    if (this.graceTimer) {
      clearTimeout(this.graceTimer);
      this.graceTimer = undefined;
    }

    const statuses = [...this.steps.values()].map((s) => s.status);
    const terminal: PlanStatus = statuses.includes('failed')
      ? 'failed'
      : this.cancelRequested
        ? 'cancelled'
        : 'succeeded';

    this.finishedAt = now();
    this.transitionPlan(terminal);
    this.context.clear();
    this.events.complete(this.planId);

    const snapshot = this.snapshot();
    this.log.info('Plan finished', {
      planId: this.planId,
      status: terminal,
      counts: snapshot.counts,
    });

    this.onFinished?.(this);

    if (this.fault) {
      this.rejectDone(this.fault);
    } else {
      this.resolveDone(snapshot);
    }
  }

  /**
   * Internal invariant broken: wind the plan down and reject its completion
   * promise once it is terminal.
   */
  private onFault(error: unknown): void {
    const fault = error instanceof Error ? error : new Error(String(error));
    this.log.error('Scheduler consistency fault', {
      planId: this.planId,
      error: fault.message,
    });
    this.fault ??= fault;
    this.beginCancel('Cancelled after an internal error');
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  private transitionStep(state: StepState, to: StepStatus, details: TransitionDetails = {}): void {
    const from = state.status;
    state.status = to;
    this.events.publish({
      kind: 'step',
      planId: this.planId,
      stepId: state.step.id,
      from,
      to,
      timestamp: now(),
      sequence: ++this.sequence,
      ...details,
    });
  }

  private transitionPlan(to: PlanStatus): void {
    const from = this.status;
    this.status = to;
    this.events.publish({
      kind: 'plan',
      planId: this.planId,
      from,
      to,
      timestamp: now(),
      sequence: ++this.sequence,
    });
  }
}
