/**
 * Engine configuration
 */

export type FailurePolicy = 'continue' | 'fail-fast';

export interface BackoffConfig {
  /** Delay before the first retry (ms) */
  initialDelayMs: number;
  /** Upper bound for any single delay (ms) */
  maxDelayMs: number;
  multiplier: number;
  /** Spread each delay by ±25% */
  jitter: boolean;
}

export interface EngineConfig {
  /** Steps of one plan that may run at the same time */
  maxConcurrentSteps: number;
  /** Default agent deadline when neither step nor capability sets one */
  stepTimeoutMs: number;
  /** Retries after the first attempt for transient failures */
  maxRetries: number;
  backoff: BackoffConfig;
  /** How long in-flight steps get to settle after cancel() */
  cancelGraceMs: number;
  /** 'continue' keeps independent branches running after a failure */
  failurePolicy: FailurePolicy;
  /** Events buffered per subscriber before the oldest is dropped */
  subscriberBufferSize: number;
  /** Finished plans kept for status() before the oldest is evicted */
  retainFinishedPlans: number;
  /** Treat internal consistency faults (duplicate writes) as fatal */
  strictConsistency: boolean;
}

export type EngineConfigInput = Partial<Omit<EngineConfig, 'backoff'>> & {
  backoff?: Partial<BackoffConfig>;
};

/** Longest delay a Node timer honours; larger values fire after 1ms */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function clampTimerDelay(ms: number): number {
  return Math.min(MAX_TIMER_DELAY_MS, Math.max(0, ms));
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  initialDelayMs: 1000,
  maxDelayMs: 30_000,
  multiplier: 2,
  jitter: true,
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  maxConcurrentSteps: 4,
  stepTimeoutMs: 60_000,
  maxRetries: 3,
  backoff: DEFAULT_BACKOFF,
  cancelGraceMs: 5000,
  failurePolicy: 'continue',
  subscriberBufferSize: 256,
  retainFinishedPlans: 100,
  strictConsistency: process.env.NODE_ENV !== 'production',
};

/**
 * Merge partial settings over the defaults and clamp values that would
 * stall the scheduler.
 */
export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const { backoff, ...rest } = input;
  const merged: EngineConfig = {
    ...DEFAULT_ENGINE_CONFIG,
    ...rest,
    backoff: { ...DEFAULT_BACKOFF, ...backoff },
  };
  return {
    ...merged,
    maxConcurrentSteps: Math.max(1, Math.floor(merged.maxConcurrentSteps)),
    stepTimeoutMs: clampTimerDelay(merged.stepTimeoutMs),
    cancelGraceMs: clampTimerDelay(merged.cancelGraceMs),
    backoff: { ...merged.backoff, maxDelayMs: clampTimerDelay(merged.backoff.maxDelayMs) },
    maxRetries: Math.max(0, Math.floor(merged.maxRetries)),
    subscriberBufferSize: Math.max(1, Math.floor(merged.subscriberBufferSize)),
    retainFinishedPlans: Math.max(0, Math.floor(merged.retainFinishedPlans)),
  };
}
