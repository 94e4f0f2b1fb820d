/**
 * Plan Engine
 *
 * Control surface over the validator, schedulers and event bus: start,
 * cancel, inspect and observe plans. Each plan gets its own scheduler,
 * context store and event sequence.
 */

import { randomUUID } from 'node:crypto';
import type { PlanInput, PlanSnapshot, PlanStatus } from '../plan/types.js';
import type { StatusEventHandler, SubscribeOptions, Unsubscribe } from '../events/types.js';
import type { PlanSubscription } from '../events/plan-event-bus.js';
import { PlanEventBus } from '../events/plan-event-bus.js';
import { AgentRegistry } from '../agents/registry.js';
import { validatePlan } from '../plan/validator.js';
import { PlanScheduler } from './scheduler.js';
import { type EngineConfig, type EngineConfigInput, resolveEngineConfig } from './config.js';
import { ConflictError, NotFoundError, type PlanValidationError } from '../types/errors.js';
import { type Result, ok, err } from '../types/result.js';
import { getLog } from '../services/get-log.js';

export interface PlanEngineOptions {
  agents?: AgentRegistry;
  events?: PlanEventBus;
  config?: EngineConfigInput;
  /** Jitter source handed to every scheduler */
  random?: () => number;
}

export interface StartOptions {
  /** Caller-chosen id, so observers can subscribe before the first event */
  planId?: string;
}

export interface PlanHandle {
  readonly planId: string;
  /** Settles once the plan is terminal */
  readonly done: Promise<PlanSnapshot>;
}

export interface PlanSummary {
  readonly id: string;
  readonly goal: string;
  readonly status: PlanStatus;
  readonly createdAt: string;
  readonly finishedAt?: string;
  readonly stepCount: number;
}

export class PlanEngine {
  readonly agents: AgentRegistry;
  readonly events: PlanEventBus;
  readonly config: EngineConfig;

  private readonly schedulers = new Map<string, PlanScheduler>();
  /** Finished plan ids, oldest first */
  private readonly finished: string[] = [];
  private readonly random?: () => number;
  private readonly log = getLog('PlanEngine');

  constructor(options: PlanEngineOptions = {}) {
    this.config = resolveEngineConfig(options.config);
    this.agents = options.agents ?? new AgentRegistry();
    this.events = options.events ?? new PlanEventBus(this.config.subscriberBufferSize);
    this.random = options.random;
  }

  /**
   * Validate and start a plan. Validation problems come back as an error
   * result; nothing runs in that case. Throws ConflictError if the id is taken.
   */
  start(input: PlanInput, options: StartOptions = {}): Result<PlanHandle, PlanValidationError> {
    const planId = options.planId ?? randomUUID();
    if (this.schedulers.has(planId)) {
      throw new ConflictError(`Plan already exists: ${planId}`, { resource: 'plan' });
    }

    const validated = validatePlan(input);
    if (!validated.ok) {
      this.log.warn('Plan rejected', {
        planId,
        kind: validated.error.kind,
        error: validated.error.message,
      });
      return err(validated.error);
    }

    const scheduler = new PlanScheduler({
      planId,
      plan: validated.value,
      agents: this.agents,
      events: this.events,
      config: this.config,
      random: this.random,
      onFinished: (s) => this.retire(s.planId),
    });
    this.schedulers.set(planId, scheduler);

    const done = scheduler.start();
    done.catch((error: unknown) => {
      this.log.error('Plan aborted by internal error', {
        planId,
        error: error instanceof Error ? error.message : String(error),
      });
    });
    return ok({ planId, done });
  }

  /**
   * Request cancellation. False when the plan is unknown, already finished
   * or already cancelling.
   */
  cancel(planId: string): boolean {
    return this.schedulers.get(planId)?.cancel() ?? false;
  }

  status(planId: string): PlanSnapshot | null {
    return this.schedulers.get(planId)?.snapshot() ?? null;
  }

  has(planId: string): boolean {
    return this.schedulers.has(planId);
  }

  list(): PlanSummary[] {
    return [...this.schedulers.values()].map((scheduler) => {
      const snapshot = scheduler.snapshot();
      return {
        id: snapshot.id,
        goal: snapshot.goal,
        status: snapshot.status,
        createdAt: snapshot.createdAt,
        ...(snapshot.finishedAt ? { finishedAt: snapshot.finishedAt } : {}),
        stepCount: snapshot.steps.length,
      };
    });
  }

  /** Plans that have not reached a terminal status */
  get runningCount(): number {
    let count = 0;
    for (const scheduler of this.schedulers.values()) {
      if (!scheduler.isFinished) count++;
    }
    return count;
  }

  /**
   * Event stream for a plan. For a finished plan the subscription ends
   * immediately, since events are not replayed.
   */
  subscribe(planId: string, options?: SubscribeOptions): PlanSubscription {
    const subscription = this.events.subscribe(planId, options);
    if (this.schedulers.get(planId)?.isFinished) {
      subscription.end();
    }
    return subscription;
  }

  /**
   * Callback form of subscribe(). A finished plan has no events left, so
   * nothing is registered for it.
   */
  listen(planId: string, handler: StatusEventHandler, options?: SubscribeOptions): Unsubscribe {
    if (this.schedulers.get(planId)?.isFinished) {
      return () => undefined;
    }
    return this.events.listen(planId, handler, options);
  }

  /**
   * Wait for a known plan to finish.
   */
  wait(planId: string): Promise<PlanSnapshot> {
    const scheduler = this.schedulers.get(planId);
    if (!scheduler) {
      return Promise.reject(new NotFoundError('Plan', planId));
    }
    return scheduler.done;
  }

  /**
   * Cancel everything still running and wait for it to wind down.
   */
  async shutdown(): Promise<void> {
    const running = [...this.schedulers.values()].filter((s) => !s.isFinished);
    for (const scheduler of running) scheduler.cancel();
    await Promise.allSettled(running.map((s) => s.done));
  }

  private retire(planId: string): void {
    this.finished.push(planId);
    while (this.finished.length > this.config.retainFinishedPlans) {
      const evicted = this.finished.shift();
      if (evicted !== undefined) this.schedulers.delete(evicted);
    }
  }
}
