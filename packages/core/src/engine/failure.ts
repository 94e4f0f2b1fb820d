/**
 * Failure classification and retry backoff
 */

import type { StepErrorDescriptor } from '../plan/types.js';
import type { BackoffConfig } from './config.js';
import { AgentError, TimeoutError, isAppError, getErrorMessage } from '../types/errors.js';

/**
 * Heuristic for errors thrown by agents that did not tag them.
 */
export function isTransientError(error: unknown): boolean {
  if (!error) return false;
  if (error instanceof TimeoutError) return true;

  const message = getErrorMessage(error).toLowerCase();

  // Network errors
  if (message.includes('network') || message.includes('econnreset') || message.includes('econnrefused')) {
    return true;
  }

  if (message.includes('timeout') || message.includes('timed out')) {
    return true;
  }

  // Rate limiting
  if (message.includes('rate limit') || message.includes('too many requests') || message.includes('429')) {
    return true;
  }

  // Server errors (5xx)
  if (message.includes('500') || message.includes('502') || message.includes('503') || message.includes('504')) {
    return true;
  }

  return message.includes('temporarily unavailable') || message.includes('service unavailable');
}

export interface FailureClassification {
  readonly transient: boolean;
  readonly descriptor: StepErrorDescriptor;
}

/**
 * Decide whether a failed attempt may be retried.
 */
export function classifyFailure(
  error: unknown,
  options: { retryOnTimeout: boolean },
): FailureClassification {
  let transient: boolean;
  if (error instanceof AgentError) {
    transient = error.transient;
  } else if (error instanceof TimeoutError) {
    transient = options.retryOnTimeout;
  } else {
    transient = isTransientError(error);
  }

  return {
    transient,
    descriptor: {
      code: isAppError(error) ? error.code : 'AGENT_ERROR',
      message: getErrorMessage(error),
      transient,
    },
  };
}

/**
 * Exponential backoff: initialDelay * multiplier^retryIndex, capped,
 * optionally spread by ±25%.
 */
export function backoffDelay(
  retryIndex: number,
  config: BackoffConfig,
  random: () => number = Math.random,
): number {
  let delay = config.initialDelayMs * Math.pow(config.multiplier, retryIndex);
  delay = Math.min(delay, config.maxDelayMs);

  if (config.jitter) {
    const jitter = delay * 0.25 * (random() * 2 - 1);
    delay = Math.max(0, delay + jitter);
  }

  return Math.round(delay);
}
