export * from './config.js';
export { ContextStore } from './context-store.js';
export { ReadyQueue } from './ready-queue.js';
export { isTransientError, classifyFailure, backoffDelay, type FailureClassification } from './failure.js';
export { PlanScheduler, type SchedulerOptions } from './scheduler.js';
export {
  PlanEngine,
  type PlanEngineOptions,
  type StartOptions,
  type PlanHandle,
  type PlanSummary,
} from './plan-engine.js';
