/**
 * Status Event Types
 *
 * Every Plan and Step transition is published as one immutable event.
 * `sequence` increases by one per event within a plan.
 */

import type { PlanStatus, StepErrorDescriptor, StepStatus } from '../plan/types.js';

export interface RetrySummary {
  /** Retries used so far, including the one being scheduled */
  readonly attempt: number;
  readonly maxRetries: number;
  readonly delayMs: number;
}

interface StatusEventBase {
  readonly planId: string;
  readonly sequence: number;
  /** ISO-8601 */
  readonly timestamp: string;
  readonly error?: StepErrorDescriptor;
}

export interface PlanStatusEvent extends StatusEventBase {
  readonly kind: 'plan';
  readonly from: PlanStatus;
  readonly to: PlanStatus;
}

export interface StepStatusEvent extends StatusEventBase {
  readonly kind: 'step';
  readonly stepId: string;
  readonly from: StepStatus;
  readonly to: StepStatus;
  /** Set on running → pending when a retry is scheduled */
  readonly retry?: RetrySummary;
}

export type StatusEvent = PlanStatusEvent | StepStatusEvent;

/**
 * Listener callback. Async handlers are awaited one event at a time.
 */
export type StatusEventHandler = (event: StatusEvent) => void | Promise<void>;

/**
 * Unsubscribe function returned by all subscription methods.
 */
export type Unsubscribe = () => void;

export interface SubscribeOptions {
  /** Events held for a slow consumer before the oldest is dropped */
  bufferSize?: number;
}
